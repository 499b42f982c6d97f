import path from 'node:path';
import type {
  Codec,
  Config,
  EncodePlan,
  EncoderCommand,
  EncodingSettings,
  FrameSequence,
  ResolvedPreset,
} from './types';

// Nothing in this module touches the filesystem or spawns anything: the same
// inputs always give the same invocation.

export function buildInputPattern(sequence: FrameSequence): string {
  const prefix = sequence.prefix.replace(/%/g, '%%');
  const number = sequence.digits > 0 ? `%0${sequence.digits}d` : '%d';
  return path.join(sequence.directory, `${prefix}${number}.${sequence.extension}`);
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

// Nome `folder`: <output>/<pasta>.mp4
// Nome `timestamped`: acrescenta data, resolução e fps do preset
export function buildOutputPath(
  config: Pick<Config, 'outputFolder' | 'outputNaming'>,
  folder: string,
  preset: ResolvedPreset,
  now: Date,
): string {
  if (config.outputNaming === 'timestamped') {
    const base = `${folder}_${formatTimestamp(now)}_${preset.resolution}_${preset.fps}fps`;
    return path.join(config.outputFolder, `${base}.mp4`);
  }
  return path.join(config.outputFolder, `${folder}.mp4`);
}

// `<name>_1.mp4`, `<name>_2.mp4`, ... for the n-th collision
export function withCollisionSuffix(outputPath: string, counter: number): string {
  const parsed = path.parse(outputPath);
  return path.join(parsed.dir, `${parsed.name}_${counter}${parsed.ext}`);
}

function codecOptions(codec: Codec, preset: ResolvedPreset, encoding: EncodingSettings): string[] {
  const rate = ['-b:v', preset.bitrate, '-maxrate', preset.bitrate, '-bufsize', preset.bitrate];
  const gop = ['-g', String(encoding.keyframeInterval), '-bf', String(encoding.bFrames)];

  if (codec === 'gpu') {
    return [
      '-c:v', encoding.gpuCodec,
      '-preset', encoding.gpuPreset,
      '-rc', 'vbr',
      ...rate,
      ...gop,
      '-rc-lookahead', String(encoding.rcLookahead),
      '-spatial-aq', String(encoding.spatialAq),
      '-temporal-aq', String(encoding.temporalAq),
    ];
  }

  return [
    '-c:v', encoding.cpuCodec,
    '-preset', encoding.cpuPreset,
    '-tune', encoding.tune,
    ...rate,
    ...gop,
  ];
}

export function buildEncoderCommand(
  sequence: FrameSequence,
  preset: ResolvedPreset,
  encoding: EncodingSettings,
  output: string,
  codec: Codec,
): EncoderCommand {
  const fps = String(preset.fps);
  return {
    codec,
    input: buildInputPattern(sequence),
    inputOptions: ['-f', 'image2', '-framerate', fps, '-start_number', String(sequence.startNumber)],
    outputOptions: [
      '-s', preset.resolution,
      '-r', fps,
      ...codecOptions(codec, preset, encoding),
      '-pix_fmt', encoding.pixelFormat,
      '-movflags', '+faststart',
    ],
    output,
  };
}

// Com aceleração por hardware: GPU primeiro e CPU como único fallback
export function buildEncodePlan(
  sequence: FrameSequence,
  preset: ResolvedPreset,
  encoding: EncodingSettings,
  output: string,
): EncodePlan {
  if (!encoding.useGpu) {
    return { primary: buildEncoderCommand(sequence, preset, encoding, output, 'cpu') };
  }
  return {
    primary: buildEncoderCommand(sequence, preset, encoding, output, 'gpu'),
    fallback: buildEncoderCommand(sequence, preset, encoding, output, 'cpu'),
  };
}

// The argv the encoder receives; fluent-ffmpeg places -y between inputs and outputs
export function toArgs(command: EncoderCommand): string[] {
  return [...command.inputOptions, '-i', command.input, '-y', ...command.outputOptions, command.output];
}
