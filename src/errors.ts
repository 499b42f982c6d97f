import type { AttemptResult } from './types';

export type ErrorCode =
  | 'CONFIG_MISSING'
  | 'CONFIG_INVALID'
  | 'RENDERS_FOLDER_MISSING'
  | 'OUTPUT_FOLDER_MISSING'
  | 'ENCODER_NOT_FOUND'
  | 'FOLDER_NOT_FOUND'
  | 'NO_FRAMES'
  | 'JOB_FAILED'
  | 'JOB_CANCELLED'
  | 'USAGE';

// Erro base; exitCode é o código de saída da CLI
export class FrameReelError extends Error {
  readonly code: ErrorCode;
  readonly exitCode: number;

  constructor(code: ErrorCode, message: string, exitCode = 1) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
  }
}

export class ConfigMissingError extends FrameReelError {
  constructor(readonly configPath: string, message?: string) {
    super('CONFIG_MISSING', message ?? `Configuration file not found at ${configPath}. Run "framereel init" to create one.`);
  }
}

export type ConfigIssue = {
  key: string;
  message: string;
};

export class ConfigInvalidError extends FrameReelError {
  constructor(readonly configPath: string, readonly issues: ConfigIssue[]) {
    super(
      'CONFIG_INVALID',
      `Invalid configuration in ${configPath}: ${issues.map((i) => `${i.key}: ${i.message}`).join('; ')}`,
    );
  }
}

export class RendersFolderMissingError extends FrameReelError {
  constructor(readonly rendersFolder: string) {
    super('RENDERS_FOLDER_MISSING', `Renders folder missing: ${rendersFolder}`);
  }
}

export class OutputFolderMissingError extends FrameReelError {
  constructor(readonly outputFolder: string) {
    super('OUTPUT_FOLDER_MISSING', `Output folder missing: ${outputFolder} (auto_create_output is disabled)`);
  }
}

export class EncoderNotFoundError extends FrameReelError {
  constructor(readonly encoderPath: string) {
    super('ENCODER_NOT_FOUND', `FFmpeg not found at ${encoderPath}`);
  }
}

export class FolderNotFoundError extends FrameReelError {
  constructor(readonly folder: string) {
    super('FOLDER_NOT_FOUND', `Folder '${folder}' not found inside renders folder.`);
  }
}

export class NoFramesError extends FrameReelError {
  constructor(readonly directory: string, readonly extension: string) {
    super('NO_FRAMES', `No *.${extension} frames found in ${directory}`);
  }
}

export class JobFailedError extends FrameReelError {
  constructor(readonly folder: string, readonly attempts: AttemptResult[]) {
    super('JOB_FAILED', `Conversion of '${folder}' failed after ${attempts.length} attempt(s): ${describeAttempts(attempts)}`);
  }
}

export class JobCancelledError extends FrameReelError {
  constructor(readonly folder: string) {
    super('JOB_CANCELLED', `Conversion of '${folder}' was cancelled.`, 130);
  }
}

export class UsageError extends FrameReelError {
  constructor(message: string) {
    super('USAGE', message, 2);
  }
}

function describeAttempts(attempts: AttemptResult[]): string {
  return attempts
    .map((a) => {
      if (a.outcome.error) return `${a.codec} ${a.outcome.error}`;
      return `${a.codec} exited with code ${a.outcome.exitCode ?? 'unknown'}`;
    })
    .join(', ');
}
