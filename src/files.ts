import fs from 'node:fs/promises';

// Erros do fs podem vir de outro realm (ex.: vm do Jest), então não usar instanceof
export function isErrnoError(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

// Verificar se o caminho existe (arquivo ou pasta)
export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch (err) {
    if (isErrnoError(err, 'ENOENT') || isErrnoError(err, 'ENOTDIR')) return false;
    throw err;
  }
}

// Verificar se o caminho é uma pasta; symlinks são seguidos
export async function isDirectory(target: string): Promise<boolean> {
  try {
    const stats = await fs.stat(target);
    return stats.isDirectory();
  } catch (err) {
    if (isErrnoError(err, 'ENOENT') || isErrnoError(err, 'ENOTDIR')) return false;
    throw err;
  }
}
