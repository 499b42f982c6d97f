import { loadConfig } from './config';
import { ConfigInvalidError, ConfigMissingError, type ErrorCode } from './errors';
import { encoderExists, resolveEncoderPath } from './ffmpeg';
import { isDirectory } from './files';
import { scanFolders } from './scanner';
import type { Config } from './types';

export type ValidationProblem = {
  code: ErrorCode;
  message: string;
  key?: string;
};

export type ValidationReport = {
  ok: boolean;
  config?: Config;
  problems: ValidationProblem[];
  notes: string[];
};

async function checkConfig(config: Config): Promise<{ problems: ValidationProblem[]; notes: string[] }> {
  const problems: ValidationProblem[] = [];
  const notes: string[] = [];

  if (!(await encoderExists(config.ffmpegPath))) {
    problems.push({
      code: 'ENCODER_NOT_FOUND',
      key: 'ffmpeg_path',
      message: `FFmpeg not found at ${resolveEncoderPath(config.ffmpegPath)}`,
    });
  }

  if (await isDirectory(config.rendersFolder)) {
    const scan = await scanFolders(config.rendersFolder, {
      extension: config.defaults.fileExtension,
      requireFrames: true,
    });
    notes.push(`${scan.folders.length} sequence folder(s) with *.${config.defaults.fileExtension} frames found.`);
  } else {
    problems.push({
      code: 'RENDERS_FOLDER_MISSING',
      key: 'renders_folder',
      message: `Renders folder missing: ${config.rendersFolder}`,
    });
  }

  if (!(await isDirectory(config.outputFolder))) {
    if (config.autoCreateOutput) {
      notes.push(`Output folder ${config.outputFolder} will be created on first conversion.`);
    } else {
      problems.push({
        code: 'OUTPUT_FOLDER_MISSING',
        key: 'output_folder',
        message: `Output folder missing: ${config.outputFolder}`,
      });
    }
  }

  if (config.presets.length > 0) {
    notes.push(`${config.presets.length} preset(s) loaded.`);
  }

  return { problems, notes };
}

// Função que carrega a configuração e verifica os caminhos, juntando todos os problemas
export async function validateEnvironment(configPath: string): Promise<ValidationReport> {
  let config: Config;
  try {
    config = await loadConfig(configPath);
  } catch (err) {
    if (err instanceof ConfigMissingError) {
      return { ok: false, problems: [{ code: err.code, message: err.message }], notes: [] };
    }
    if (err instanceof ConfigInvalidError) {
      const problems = err.issues.map((issue): ValidationProblem => ({
        code: err.code,
        key: issue.key,
        message: `${issue.key}: ${issue.message}`,
      }));
      return { ok: false, problems, notes: [] };
    }
    throw err;
  }

  const { problems, notes } = await checkConfig(config);
  return { ok: problems.length === 0, config, problems, notes };
}
