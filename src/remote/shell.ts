/**
 * POSIX shell quoting for commands sent to `sh -c`.
 */

const SAFE_WORD = /^[A-Za-z0-9_\-.,:/@%+=]+$/;

export function quote(value: string): string {
  if (value.length > 0 && SAFE_WORD.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, "'\\''")}'`;
}

/**
 * Quote a directory, keeping a leading `~/` expandable.
 */
export function quoteDir(dir: string): string {
  if (dir === '~') {
    return '"$HOME"';
  }
  if (dir.startsWith('~/')) {
    return `"$HOME"/${quote(dir.slice(2))}`;
  }
  return quote(dir);
}

/**
 * Absolute form of a path relative to the command's working directory.
 */
export function absoluteFromCwd(path: string): string {
  return `"$PWD"/${quote(path)}`;
}

export function exportEnv(env: Record<string, string>): string {
  return Object.entries(env)
    .map(([key, value]) => `export ${key}=${quote(value)}`)
    .join('; ');
}
