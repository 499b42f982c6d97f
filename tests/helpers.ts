import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { EncoderLauncher, LaunchOptions } from '../src/ffmpeg';
import type { EncoderCommand, ProcessOutcome } from '../src/types';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'framereel-test-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeFrames(dir: string, names: readonly string[]): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
  for (const name of names) {
    await fs.writeFile(path.join(dir, name), 'frame');
  }
}

export function frameNames(prefix: string, count: number, extension: string, digits = 4, start = 1): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}${String(start + i).padStart(digits, '0')}.${extension}`);
}

export type ProjectDocument = Record<string, unknown>;

export function baseDocument(overrides: ProjectDocument = {}): ProjectDocument {
  return {
    project_name: 'Test Show',
    renders_folder: 'renders',
    output_folder: 'output',
    ffmpeg_path: 'bin/ffmpeg',
    defaults: { resolution: '1920x1080', bitrate: '50M', file_extension: 'jpeg', fps: 30 },
    presets: [
      { name: 'fulldome-2k', description: '2K dome master', resolution: '2048x2048', bitrate: '100M', fps: 60 },
      { name: 'preview', description: 'Review copy', resolution: '1024x1024', bitrate: '10M' },
    ],
    ...overrides,
  };
}

export type Project = {
  root: string;
  configPath: string;
  rendersFolder: string;
  outputFolder: string;
  ffmpegPath: string;
};

// Temp project: config.json, empty renders folder, placeholder ffmpeg binary
export async function makeProject(document: ProjectDocument = baseDocument()): Promise<Project> {
  const root = await makeTempDir();
  const project: Project = {
    root,
    configPath: path.join(root, 'config.json'),
    rendersFolder: path.join(root, 'renders'),
    outputFolder: path.join(root, 'output'),
    ffmpegPath: path.join(root, 'bin', 'ffmpeg'),
  };

  await fs.mkdir(project.rendersFolder, { recursive: true });
  await fs.mkdir(path.dirname(project.ffmpegPath), { recursive: true });
  await fs.writeFile(project.ffmpegPath, 'placeholder');
  await fs.writeFile(project.configPath, JSON.stringify(document, null, 2));
  return project;
}

export type LaunchCall = {
  encoderPath: string;
  command: EncoderCommand;
};

// Records launches and replays scripted outcomes; launches past the script succeed
export class FakeLauncher implements EncoderLauncher {
  readonly calls: LaunchCall[] = [];

  constructor(private readonly script: Array<Partial<ProcessOutcome>> = []) {}

  async launch(encoderPath: string, command: EncoderCommand, options: LaunchOptions = {}): Promise<ProcessOutcome> {
    this.calls.push({ encoderPath, command });
    const scripted = this.script[this.calls.length - 1] ?? {};
    const outcome: ProcessOutcome = { exitCode: 0, output: [], cancelled: false, ...scripted };
    outcome.output.forEach((line) => options.onOutput?.(line));
    return outcome;
  }
}

export type CapturedIo = {
  out: string[];
  err: string[];
  io: { out: (line: string) => void; err: (line: string) => void };
};

export function captureIo(): CapturedIo {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, io: { out: (line) => out.push(line), err: (line) => err.push(line) } };
}
