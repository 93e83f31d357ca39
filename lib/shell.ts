/**
 * Quote a value for a POSIX shell command line.
 */
export function quote(value: string | number): string {
  const text = String(value);
  if (/^[A-Za-z0-9_\/.:=@%+-]+$/.test(text)) {
    return text;
  }
  return `'${text.replace(/'/g, `'\\''`)}'`;
}
