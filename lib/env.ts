import { parse } from 'dotenv';
import { ValidationError } from './errors';
import { quote } from './shell';
import type { CommandRunner } from './runner';
import type { SecretsBundle } from './models';

const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const BARE_VALUE = /^[A-Za-z0-9_\-.:/@+,=]+$/;

export interface BundleValidation {
  valid: boolean;
  missing: string[];
  errors: string[];
}

export function parseEnvFile(content: string): SecretsBundle {
  return parse(content);
}

function formatValue(key: string, value: string): string {
  if (BARE_VALUE.test(value)) return value;
  if (!value.includes("'")) return `'${value}'`;
  // Double quotes expand \n, so only use them when that cannot alter the value
  if (!value.includes('"') && !value.includes('\n') && !value.includes('\\')) return `"${value}"`;
  // systemd EnvironmentFile= has no other quoting that both readers agree on
  throw new ValidationError(`Value of ${key} cannot be written to an environment file`, { key });
}

/**
 * Serialise a bundle as a flat KEY=VALUE file readable by dotenv and systemd.
 */
export function serializeEnvFile(bundle: SecretsBundle): string {
  const lines = Object.entries(bundle).map(([key, value]) => {
    if (!KEY_PATTERN.test(key)) {
      throw new ValidationError(`Invalid environment variable name: ${key}`, { key });
    }
    return `${key}=${formatValue(key, value)}`;
  });
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

/**
 * Check that a bundle carries every required key and a usable PORT.
 */
export function validateBundle(bundle: SecretsBundle, requiredKeys: string[]): BundleValidation {
  const missing = requiredKeys.filter((key) => bundle[key] === undefined || bundle[key].trim() === '');
  const errors: string[] = [];

  for (const key of Object.keys(bundle)) {
    if (!KEY_PATTERN.test(key)) errors.push(`Invalid variable name: ${key}`);
  }

  if (bundle.PORT !== undefined && bundle.PORT.trim() !== '') {
    const port = Number(bundle.PORT);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      errors.push(`PORT must be an integer between 1 and 65535, got "${bundle.PORT}"`);
    }
  }

  return { valid: missing.length === 0 && errors.length === 0, missing, errors };
}

export function mergeBundle(
  current: SecretsBundle,
  updates: SecretsBundle,
  removals: string[] = [],
): SecretsBundle {
  const merged: SecretsBundle = { ...current, ...updates };
  for (const key of removals) {
    delete merged[key];
  }
  return merged;
}

/**
 * Reads and writes the owner-only environment file on the target.
 */
export class EnvManager {
  async exists(runner: CommandRunner, filePath: string): Promise<boolean> {
    const { stdout } = await runner.run(`test -f ${quote(filePath)} && echo yes || echo no`);
    return stdout.trim() === 'yes';
  }

  async readEnvFile(runner: CommandRunner, filePath: string): Promise<SecretsBundle> {
    if (!(await this.exists(runner, filePath))) {
      return {};
    }
    const { stdout } = await runner.run(`cat ${quote(filePath)}`);
    return parseEnvFile(stdout);
  }

  /**
   * Write the bundle with mode 0600. Returns false when the file already held
   * exactly this content.
   */
  async writeEnvFile(runner: CommandRunner, filePath: string, bundle: SecretsBundle): Promise<boolean> {
    const content = serializeEnvFile(bundle);
    if (await this.exists(runner, filePath)) {
      const { stdout } = await runner.run(`cat ${quote(filePath)}`);
      if (stdout === content) {
        await runner.run(`chmod 600 ${quote(filePath)}`);
        return false;
      }
    }
    const target = quote(filePath);
    await runner.run(`umask 077 && cat > ${target} && chmod 600 ${target}`, { input: content });
    return true;
  }

  async updateEnvFile(
    runner: CommandRunner,
    filePath: string,
    updates: SecretsBundle,
    removals: string[] = [],
  ): Promise<SecretsBundle> {
    const current = await this.readEnvFile(runner, filePath);
    const merged = mergeBundle(current, updates, removals);
    await this.writeEnvFile(runner, filePath, merged);
    return merged;
  }

  /** Keys only; values never leave the host */
  async listKeys(runner: CommandRunner, filePath: string): Promise<string[]> {
    return Object.keys(await this.readEnvFile(runner, filePath)).sort();
  }
}

export default new EnvManager();
