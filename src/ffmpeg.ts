import ffmpegInstaller from '@ffmpeg-installer/ffmpeg';
import ffmpeg from 'fluent-ffmpeg';
import { BUNDLED_ENCODER } from './config';
import { pathExists } from './files';
import { logger } from './logger';
import type { EncoderCommand, ProcessOutcome } from './types';

export type LaunchOptions = {
  signal?: AbortSignal;
  onOutput?: (line: string) => void;
};

// Executa uma invocação do encoder até o fim; resolve com o resultado, falhas incluídas, e nunca rejeita
export interface EncoderLauncher {
  launch(encoderPath: string, command: EncoderCommand, options?: LaunchOptions): Promise<ProcessOutcome>;
}

// `bundled` selects the binary shipped by @ffmpeg-installer/ffmpeg
export function resolveEncoderPath(ffmpegPath: string): string {
  return ffmpegPath === BUNDLED_ENCODER ? ffmpegInstaller.path : ffmpegPath;
}

export async function encoderExists(ffmpegPath: string): Promise<boolean> {
  return pathExists(resolveEncoderPath(ffmpegPath));
}

const EXIT_CODE = /exited with code (\d+)/;

// fluent-ffmpeg reports a non-zero exit only through the error message
export function exitCodeFromError(err: Error): number | null {
  const match = EXIT_CODE.exec(err.message);
  return match ? Number.parseInt(match[1], 10) : null;
}

export class FluentFfmpegLauncher implements EncoderLauncher {
  // Função que roda o ffmpeg via fluent-ffmpeg
  launch(encoderPath: string, command: EncoderCommand, options: LaunchOptions = {}): Promise<ProcessOutcome> {
    return new Promise<ProcessOutcome>((resolve) => {
      const output: string[] = [];
      const { signal } = options;

      // Já cancelado: nem iniciar o processo
      if (signal?.aborted) {
        resolve({ exitCode: null, output, cancelled: true });
        return;
      }

      // Montar o comando
      const proc = ffmpeg()
        .setFfmpegPath(encoderPath)
        .input(command.input)
        .inputOptions(command.inputOptions)
        .outputOptions(command.outputOptions)
        .output(command.output);

      // Cancelamento mata o processo; antes do spawn o kill não tem efeito, então repetir no 'start'
      let cancelled = false;
      const onAbort = () => {
        cancelled = true;
        logger.warn({ codec: command.codec, output: command.output }, 'Killing ffmpeg on cancel request');
        proc.kill('SIGKILL');
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const finish = (outcome: ProcessOutcome) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(outcome);
      };

      proc
        .on('start', (commandLine: string) => {
          logger.info({ cmd: commandLine, codec: command.codec }, 'ffmpeg start');
          if (cancelled) proc.kill('SIGKILL');
        })
        .on('stderr', (line: string) => {
          output.push(line);
          options.onOutput?.(line);
        })
        .on('progress', (p: { frames?: number; currentFps?: number; timemark?: string }) => {
          logger.debug({ frames: p.frames, currentFps: p.currentFps, timemark: p.timemark }, 'ffmpeg progress');
        })
        .on('error', (err: Error) => {
          const exitCode = exitCodeFromError(err);
          logger.error({ err, exitCode, cancelled, codec: command.codec }, 'ffmpeg failed');
          finish({
            exitCode,
            output,
            cancelled,
            error: cancelled || exitCode !== null ? undefined : err.message,
          });
        })
        .on('end', () => {
          logger.info({ codec: command.codec, output: command.output, cancelled }, 'ffmpeg finished');
          finish({ exitCode: cancelled ? null : 0, output, cancelled });
        });

      // Iniciar
      proc.run();
    });
  }
}
