import fs from 'node:fs/promises';
import path from 'node:path';
import { buildEncodePlan, buildOutputPath, withCollisionSuffix } from './command';
import { normalizeExtension, resolvePreset } from './config';
import {
  EncoderNotFoundError,
  FolderNotFoundError,
  JobCancelledError,
  JobFailedError,
  OutputFolderMissingError,
  RendersFolderMissingError,
} from './errors';
import { encoderExists, resolveEncoderPath, type EncoderLauncher } from './ffmpeg';
import { isDirectory, pathExists } from './files';
import { logger } from './logger';
import { runWithFallback, type RunOptions } from './runner';
import { readSequence } from './scanner';
import type { Config, ConversionRequest, ConversionResult, EncodePlan, FrameSequence, ResolvedPreset } from './types';

export type PreparedJob = {
  folder: string;
  preset: ResolvedPreset;
  sequence: FrameSequence;
  encoderPath: string;
  outputPath: string;
  plan: EncodePlan;
};

export type ConvertDeps = RunOptions & {
  launcher: EncoderLauncher;
  now?: () => Date;
};

// Timestamped names get _1, _2, ... instead of overwriting an earlier run
async function availableOutputPath(config: Config, outputPath: string): Promise<string> {
  if (config.outputNaming !== 'timestamped') return outputPath;

  let candidate = outputPath;
  for (let counter = 1; await pathExists(candidate); counter++) {
    candidate = withCollisionSuffix(outputPath, counter);
  }
  return candidate;
}

// Preparar a conversão sem escrever nada (usado também pelo --dry-run)
export async function prepareConversion(config: Config, request: ConversionRequest, now: Date): Promise<PreparedJob> {
  // Verificar o binário do ffmpeg
  const encoderPath = resolveEncoderPath(config.ffmpegPath);
  if (!(await encoderExists(config.ffmpegPath))) {
    throw new EncoderNotFoundError(encoderPath);
  }

  if (!(await isDirectory(config.rendersFolder))) {
    throw new RendersFolderMissingError(config.rendersFolder);
  }

  // Only immediate subdirectories of the renders root are sequence folders
  const folderPath = path.join(config.rendersFolder, request.folder);
  if (
    request.folder === '' ||
    request.folder === '.' ||
    request.folder === '..' ||
    path.basename(request.folder) !== request.folder ||
    !(await isDirectory(folderPath))
  ) {
    throw new FolderNotFoundError(request.folder);
  }

  // Resolver preset e sequência de frames
  const preset = resolvePreset(config, request.preset);
  const extension = request.extension ? normalizeExtension(request.extension) : preset.fileExtension;
  const sequence = await readSequence(folderPath, extension);

  // Montar caminho de saída e plano de encode
  const outputPath = await availableOutputPath(config, buildOutputPath(config, request.folder, preset, now));
  const plan = buildEncodePlan(sequence, preset, config.encoding, outputPath);

  return { folder: request.folder, preset, sequence, encoderPath, outputPath, plan };
}

// Criar a pasta de saída se permitido
async function ensureOutputFolder(config: Config): Promise<void> {
  if (await isDirectory(config.outputFolder)) return;
  if (!config.autoCreateOutput) throw new OutputFolderMissingError(config.outputFolder);

  await fs.mkdir(config.outputFolder, { recursive: true });
  logger.info({ outputFolder: config.outputFolder }, 'Created output folder');
}

// Função que converte uma pasta de sequência com um preset.
// Falha vira JobFailedError e cancelamento vira JobCancelledError, ambos com as tentativas
export async function convertFolder(
  config: Config,
  request: ConversionRequest,
  deps: ConvertDeps,
): Promise<ConversionResult> {
  const startTime = Date.now();
  const now = deps.now ?? (() => new Date());

  // Preparar job e pasta de saída
  const job = await prepareConversion(config, request, now());
  await ensureOutputFolder(config);

  logger.info(
    {
      phase: 'prepare',
      folder: job.folder,
      preset: job.preset.name,
      frames: job.sequence.frameCount,
      startNumber: job.sequence.startNumber,
      outputPath: job.outputPath,
      fallback: job.plan.fallback !== undefined,
    },
    'Starting conversion',
  );

  // Rodar o encode (GPU e depois CPU se necessário)
  const outcome = await runWithFallback(job.encoderPath, job.plan, deps.launcher, {
    signal: deps.signal,
    onAttempt: deps.onAttempt,
    onOutput: deps.onOutput,
  });
  const durationMs = Date.now() - startTime;

  if (outcome.status === 'cancelled') {
    logger.warn({ folder: job.folder, duration: durationMs }, 'Conversion cancelled');
    throw new JobCancelledError(job.folder);
  }
  if (outcome.status === 'failed') {
    logger.error(
      {
        folder: job.folder,
        duration: durationMs,
        attempts: outcome.attempts.map((a) => ({ codec: a.codec, exitCode: a.outcome.exitCode, output: a.outcome.output })),
      },
      'Conversion failed',
    );
    throw new JobFailedError(job.folder, outcome.attempts);
  }

  logger.info(
    { phase: 'summary', folder: job.folder, codec: outcome.codec, attempts: outcome.attempts.length, duration: durationMs },
    'Conversion completed',
  );

  // Retornar resultado
  return {
    folder: job.folder,
    preset: job.preset,
    outputPath: job.outputPath,
    frameCount: job.sequence.frameCount,
    codec: outcome.codec,
    attempts: outcome.attempts,
    durationMs,
  };
}
