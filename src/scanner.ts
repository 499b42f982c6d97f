import fs from 'node:fs/promises';
import path from 'node:path';
import { NoFramesError, RendersFolderMissingError } from './errors';
import { isDirectory } from './files';
import { logger } from './logger';
import type { FolderInfo, FrameSequence } from './types';

export type ScanOptions = {
  // Only count files with this extension; defaults to counting every file
  extension?: string;
  // Drop folders without a single matching frame
  requireFrames?: boolean;
};

export type ScanResult = {
  folders: FolderInfo[];
  error?: RendersFolderMissingError;
};

function hasExtension(fileName: string, extension: string): boolean {
  return fileName.toLowerCase().endsWith(`.${extension.toLowerCase()}`);
}

function byName(a: FolderInfo, b: FolderInfo): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

// Ler uma pasta de sequência; pastas ilegíveis são puladas com um aviso no log
async function readFolder(name: string, full: string, options: ScanOptions): Promise<FolderInfo | undefined> {
  try {
    // stat segue symlinks, então pastas linkadas também contam
    const stats = await fs.stat(full);
    if (!stats.isDirectory()) return undefined;

    // Contar os frames com a extensão pedida
    const children = await fs.readdir(full, { withFileTypes: true });
    const frameCount = children.filter(
      (child) => child.isFile() && (options.extension === undefined || hasExtension(child.name, options.extension)),
    ).length;

    if (options.requireFrames && frameCount === 0) return undefined;
    return { name, path: full, frameCount, modifiedAt: stats.mtime };
  } catch (err) {
    logger.warn({ err, folder: full }, 'Skipping unreadable folder');
    return undefined;
  }
}

// Função que lista as subpastas diretas da pasta de renders (sem recursão).
// Pasta de renders ausente retorna lista vazia junto com o erro, sem lançar.
export async function scanFolders(rendersRoot: string, options: ScanOptions = {}): Promise<ScanResult> {
  if (!(await isDirectory(rendersRoot))) {
    return { folders: [], error: new RendersFolderMissingError(rendersRoot) };
  }

  const entries = await fs.readdir(rendersRoot, { withFileTypes: true });
  const folders: FolderInfo[] = [];

  for (const entry of entries) {
    if (!entry.isDirectory() && !entry.isSymbolicLink()) continue;

    const folder = await readFolder(entry.name, path.join(rendersRoot, entry.name), options);
    if (folder) folders.push(folder);
  }

  // Ordenar por nome
  folders.sort(byName);
  return { folders };
}

export function latestFolderIndex(folders: readonly FolderInfo[]): number {
  let latest = 0;
  folders.forEach((folder, index) => {
    if (folder.modifiedAt.getTime() > folders[latest].modifiedAt.getTime()) latest = index;
  });
  return latest;
}

const FRAME_NAME = /^(.*?)(\d+)$/;

type FrameGroup = {
  prefix: string;
  extension: string;
  numbers: string[];
};

// Menor valor sem espalhar argumentos: sequências longas passam de 100k frames
function minimum(values: readonly number[]): number {
  let result = Number.POSITIVE_INFINITY;
  for (const value of values) {
    if (value < result) result = value;
  }
  return result;
}

// Zero padded runs keep their width; runs like 1..10 without padding get 0 (plain %d)
function paddingWidth(numbers: readonly string[]): number {
  const shortest = minimum(numbers.map((n) => n.length));
  const padded = numbers.some((n) => n.length === shortest && n.startsWith('0'));
  if (padded || numbers.every((n) => n.length === shortest)) return shortest;
  return 0;
}

// Função que descobre a numeração dos frames a partir da listagem da pasta.
// Os arquivos são agrupados pelo texto antes do número; o maior grupo vence,
// e no empate vence o menor prefixo.
export function detectSequence(directory: string, fileNames: readonly string[], extension: string): FrameSequence | undefined {
  const groups = new Map<string, FrameGroup>();

  for (const fileName of fileNames) {
    if (!hasExtension(fileName, extension)) continue;

    // Separar prefixo e número do nome sem extensão
    const stem = fileName.slice(0, fileName.length - extension.length - 1);
    const match = FRAME_NAME.exec(stem);
    if (!match) continue;

    const [, prefix, number] = match;
    const found = fileName.slice(stem.length + 1);
    const key = `${prefix}\u0000${found}`;
    const group = groups.get(key) ?? { prefix, extension: found, numbers: [] };
    group.numbers.push(number);
    groups.set(key, group);
  }

  // Escolher o grupo dominante
  let best: FrameGroup | undefined;
  for (const group of groups.values()) {
    if (
      !best ||
      group.numbers.length > best.numbers.length ||
      (group.numbers.length === best.numbers.length && group.prefix < best.prefix)
    ) {
      best = group;
    }
  }
  if (!best) return undefined;

  return {
    directory,
    prefix: best.prefix,
    digits: paddingWidth(best.numbers),
    startNumber: minimum(best.numbers.map((n) => Number.parseInt(n, 10))),
    extension: best.extension,
    frameCount: best.numbers.length,
  };
}

export async function readSequence(directory: string, extension: string): Promise<FrameSequence> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  const files = entries.filter((e) => e.isFile()).map((e) => e.name);
  const sequence = detectSequence(directory, files, extension);
  if (!sequence) throw new NoFramesError(directory, extension);
  return sequence;
}
