export type OutputNaming = 'folder' | 'timestamped';

export type EncodingParameters = {
  resolution: string; // WxH, e.g. 2048x2048
  bitrate: string; // ffmpeg rate, e.g. 100M or 8000k
  fps: number;
  fileExtension: string; // lower case, no leading dot
};

export type Defaults = EncodingParameters & {
  presetName?: string;
};

// Raw preset as written in config.json: every encoding key is an optional override
export type Preset = Partial<EncodingParameters> & {
  name: string;
  description: string;
};

// Preset merged over the configuration defaults
export type ResolvedPreset = EncodingParameters & {
  name: string;
  description: string;
};

export type EncodingSettings = {
  useGpu: boolean;
  gpuCodec: string;
  cpuCodec: string;
  gpuPreset: string;
  cpuPreset: string;
  tune: string;
  pixelFormat: string;
  keyframeInterval: number;
  bFrames: number;
  rcLookahead: number;
  spatialAq: number;
  temporalAq: number;
};

export type Theme = 'classic' | 'mono';

export type UiSettings = {
  theme: Theme;
  showFileCount: boolean;
  autoSelectLatest: boolean;
};

export type Config = {
  configPath: string;
  projectName: string;
  rendersFolder: string; // absolute
  outputFolder: string; // absolute
  ffmpegPath: string; // absolute, or 'bundled'
  autoCreateOutput: boolean;
  outputNaming: OutputNaming;
  defaults: Defaults;
  presets: readonly Preset[];
  encoding: EncodingSettings;
  ui: UiSettings;
};

export type FolderInfo = {
  name: string;
  path: string;
  frameCount: number;
  modifiedAt: Date;
};

export type FrameSequence = {
  directory: string;
  prefix: string; // text before the frame number, e.g. frame_
  digits: number; // zero padded width of the frame number, 0 when unpadded
  startNumber: number;
  extension: string; // as found on disk
  frameCount: number;
};

export type Codec = 'gpu' | 'cpu';

export type EncoderCommand = {
  codec: Codec;
  input: string; // printf style frame pattern
  inputOptions: string[];
  outputOptions: string[];
  output: string;
};

export type EncodePlan = {
  primary: EncoderCommand;
  fallback?: EncoderCommand;
};

export type ProcessOutcome = {
  exitCode: number | null; // null when the process never ran or was killed
  output: string[]; // captured stderr lines
  cancelled: boolean;
  error?: string;
};

export type AttemptResult = {
  codec: Codec;
  args: string[];
  outcome: ProcessOutcome;
  durationMs: number;
};

export type JobOutcome =
  | { status: 'succeeded'; codec: Codec; attempts: AttemptResult[] }
  | { status: 'failed'; attempts: AttemptResult[] }
  | { status: 'cancelled'; attempts: AttemptResult[] };

export type ConversionRequest = {
  folder: string;
  preset?: string;
  extension?: string; // overrides the preset's file extension
};

export type ConversionResult = {
  folder: string;
  preset: ResolvedPreset;
  outputPath: string;
  frameCount: number;
  codec: Codec;
  attempts: AttemptResult[];
  durationMs: number;
};
