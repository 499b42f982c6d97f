import fs from 'node:fs/promises';
import path from 'node:path';
import mime from 'mime';
import { z } from 'zod';
import { ConfigInvalidError, ConfigMissingError, UsageError, type ConfigIssue } from './errors';
import { isErrnoError, pathExists } from './files';
import type { Config, Defaults, Preset, ResolvedPreset } from './types';

export const BUNDLED_ENCODER = 'bundled';

export function normalizeExtension(extension: string): string {
  return extension.trim().replace(/^\./, '').toLowerCase();
}

function isImageExtension(extension: string): boolean {
  return mime.getType(extension)?.startsWith('image/') ?? false;
}

const resolutionSchema = z.string().regex(/^\d+x\d+$/, 'Expected WIDTHxHEIGHT, e.g. 1920x1080');
const bitrateSchema = z.string().regex(/^\d+(\.\d+)?[kKmMgG]?$/, 'Expected a bitrate such as 50M or 8000k');
const fpsSchema = z.number().int().positive();
const extensionSchema = z
  .string()
  .min(1)
  .transform(normalizeExtension)
  .refine(isImageExtension, 'Expected an image file extension such as png or jpeg');
const levelSchema = z.number().int().nonnegative();

const presetSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  resolution: resolutionSchema.optional(),
  bitrate: bitrateSchema.optional(),
  fps: fpsSchema.optional(),
  file_extension: extensionSchema.optional(),
});

const configSchema = z
  .object({
    project_name: z.string().min(1),
    renders_folder: z.string().min(1),
    output_folder: z.string().min(1),
    ffmpeg_path: z.string().min(1),
    auto_create_output: z.boolean().default(true),
    output_naming: z.enum(['folder', 'timestamped']).default('folder'),
    defaults: z.object({
      resolution: resolutionSchema,
      bitrate: bitrateSchema,
      file_extension: extensionSchema,
      fps: fpsSchema,
      preset_name: z.string().min(1).optional(),
    }),
    presets: z.array(presetSchema).default([]),
    encoding: z
      .object({
        use_gpu: z.boolean().default(true),
        gpu_codec: z.string().min(1).default('h264_nvenc'),
        cpu_codec: z.string().min(1).default('libx264'),
        gpu_preset: z.string().min(1).default('p7'),
        cpu_preset: z.string().min(1).default('veryslow'),
        tune: z.string().min(1).default('animation'),
        pixel_format: z.string().min(1).default('yuv420p'),
        keyframe_interval: levelSchema.default(60),
        b_frames: levelSchema.default(3),
        rc_lookahead: levelSchema.default(32),
        spatial_aq: levelSchema.default(1),
        temporal_aq: levelSchema.default(1),
      })
      .default({}),
    ui: z
      .object({
        theme: z.enum(['classic', 'mono']).default('classic'),
        show_file_count: z.boolean().default(true),
        auto_select_latest: z.boolean().default(true),
      })
      .default({}),
  })
  .superRefine((raw, ctx) => {
    const names = new Set<string>();
    raw.presets.forEach((preset, index) => {
      if (names.has(preset.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['presets', index, 'name'],
          message: `Duplicate preset name '${preset.name}'`,
        });
      }
      names.add(preset.name);
    });

    const defaultPreset = raw.defaults.preset_name;
    if (defaultPreset !== undefined && !names.has(defaultPreset)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['defaults', 'preset_name'],
        message: `Preset '${defaultPreset}' is not defined in presets`,
      });
    }
  });

type RawConfig = z.infer<typeof configSchema>;

function toIssue(issue: z.ZodIssue): ConfigIssue {
  return {
    key: issue.path.length > 0 ? issue.path.join('.') : '<document>',
    message: issue.message,
  };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function toConfig(configPath: string, raw: RawConfig): Config {
  const baseDir = path.dirname(configPath);
  const resolvePath = (value: string) => path.resolve(baseDir, value);

  return {
    configPath,
    projectName: raw.project_name,
    rendersFolder: resolvePath(raw.renders_folder),
    outputFolder: resolvePath(raw.output_folder),
    ffmpegPath: raw.ffmpeg_path === BUNDLED_ENCODER ? BUNDLED_ENCODER : resolvePath(raw.ffmpeg_path),
    autoCreateOutput: raw.auto_create_output,
    outputNaming: raw.output_naming,
    defaults: {
      resolution: raw.defaults.resolution,
      bitrate: raw.defaults.bitrate,
      fps: raw.defaults.fps,
      fileExtension: raw.defaults.file_extension,
      presetName: raw.defaults.preset_name,
    },
    presets: raw.presets.map((p) => ({
      name: p.name,
      description: p.description,
      resolution: p.resolution,
      bitrate: p.bitrate,
      fps: p.fps,
      fileExtension: p.file_extension,
    })),
    encoding: {
      useGpu: raw.encoding.use_gpu,
      gpuCodec: raw.encoding.gpu_codec,
      cpuCodec: raw.encoding.cpu_codec,
      gpuPreset: raw.encoding.gpu_preset,
      cpuPreset: raw.encoding.cpu_preset,
      tune: raw.encoding.tune,
      pixelFormat: raw.encoding.pixel_format,
      keyframeInterval: raw.encoding.keyframe_interval,
      bFrames: raw.encoding.b_frames,
      rcLookahead: raw.encoding.rc_lookahead,
      spatialAq: raw.encoding.spatial_aq,
      temporalAq: raw.encoding.temporal_aq,
    },
    ui: {
      theme: raw.ui.theme,
      showFileCount: raw.ui.show_file_count,
      autoSelectLatest: raw.ui.auto_select_latest,
    },
  };
}

// Validar o documento já decodificado; caminhos relativos partem da pasta do config
export function parseConfig(configPath: string, document: unknown): Config {
  const parsed = configSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigInvalidError(configPath, parsed.error.issues.map(toIssue));
  }
  return deepFreeze(toConfig(configPath, parsed.data));
}

export async function loadConfig(configPath: string): Promise<Config> {
  const absolute = path.resolve(configPath);

  let text: string;
  try {
    text = await fs.readFile(absolute, 'utf8');
  } catch (err) {
    if (isErrnoError(err, 'ENOENT')) throw new ConfigMissingError(absolute);
    throw err;
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : 'Malformed JSON';
    throw new ConfigInvalidError(absolute, [{ key: '<document>', message }]);
  }

  return parseConfig(absolute, document);
}

export function mergePreset(defaults: Defaults, preset: Preset): ResolvedPreset {
  return {
    name: preset.name,
    description: preset.description,
    resolution: preset.resolution ?? defaults.resolution,
    bitrate: preset.bitrate ?? defaults.bitrate,
    fps: preset.fps ?? defaults.fps,
    fileExtension: preset.fileExtension ?? defaults.fileExtension,
  };
}

export function defaultsPreset(defaults: Defaults): ResolvedPreset {
  return mergePreset(defaults, { name: 'defaults', description: 'Default configuration' });
}

// Escolher o preset do job: nome explícito, depois defaults.preset_name, depois os próprios defaults
export function resolvePreset(config: Config, name?: string): ResolvedPreset {
  if (name !== undefined) {
    const preset = config.presets.find((p) => p.name === name);
    if (preset) return mergePreset(config.defaults, preset);
    if (name === 'defaults' && config.presets.length === 0) return defaultsPreset(config.defaults);
    const known = config.presets.map((p) => p.name).join(', ') || 'none';
    throw new UsageError(`Preset '${name}' not found in ${path.basename(config.configPath)} (available: ${known})`);
  }

  const presetName = config.defaults.presetName;
  if (presetName !== undefined) return resolvePreset(config, presetName);
  return defaultsPreset(config.defaults);
}

// Presets offered for selection; a config without presets still offers its defaults
export function selectablePresets(config: Config): ResolvedPreset[] {
  if (config.presets.length === 0) return [defaultsPreset(config.defaults)];
  return config.presets.map((p) => mergePreset(config.defaults, p));
}

export type InitResult = 'created' | 'overwritten' | 'exists';

export async function initConfig(
  target: string,
  template: string,
  options: { force?: boolean } = {},
): Promise<InitResult> {
  const exists = await pathExists(target);
  if (exists && !options.force) return 'exists';

  let content: string;
  try {
    content = await fs.readFile(template, 'utf8');
  } catch (err) {
    if (isErrnoError(err, 'ENOENT')) {
      throw new ConfigMissingError(template, `Configuration template not found at ${template}.`);
    }
    throw err;
  }

  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, content, { encoding: 'utf8', flag: exists ? 'w' : 'wx' });
  return exists ? 'overwritten' : 'created';
}
