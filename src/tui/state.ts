import { FrameReelError, JobFailedError } from '../errors';
import type { Codec, ConversionResult, FolderInfo, ResolvedPreset } from '../types';

export type KeyName =
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'tab'
  | 'start'
  | 'refresh'
  | 'cancel'
  | 'quit'
  | 'other';

export type JobSummary = {
  status: 'succeeded' | 'failed' | 'cancelled';
  message: string;
  details: string[];
};

export type UiEvent =
  | { type: 'key'; key: KeyName }
  | { type: 'scanned'; extension: string; folders: readonly FolderInfo[]; error?: string }
  | { type: 'attempt'; codec: Codec; attempt: number }
  | { type: 'output'; line: string }
  | { type: 'tick' }
  | { type: 'jobFinished'; summary: JobSummary };

export type Effect =
  | { type: 'scan'; extension: string }
  | { type: 'convert'; folder: string; preset: string; extension: string }
  | { type: 'cancel' }
  | { type: 'exit' };

type Selection = {
  folders: readonly FolderInfo[];
  presets: readonly ResolvedPreset[];
  folderIndex: number;
  presetIndex: number;
  notice?: string;
  scanError?: string;
};

export type RunningJob = {
  folder: string;
  preset: string;
  codec?: Codec;
  attempt: number;
  spinner: number;
  lastLine?: string;
  cancelling: boolean;
};

export type UiState =
  | (Selection & { mode: 'browsing' })
  | (Selection & { mode: 'presetSelect' })
  | (Selection & { mode: 'converting'; job: RunningJob })
  | (Selection & { mode: 'done'; summary: JobSummary });

export type Mode = UiState['mode'];

type Focused = Extract<UiState, { mode: 'browsing' | 'presetSelect' }>;

export type Transition = {
  state: UiState;
  effects: Effect[];
};

export type InitialStateOptions = {
  folders: readonly FolderInfo[];
  presets: readonly ResolvedPreset[];
  scanError?: string;
  // index of the folder to highlight first, e.g. the most recently modified one
  folderIndex?: number;
  presetName?: string;
};

function clamp(index: number, length: number): number {
  if (length === 0) return 0;
  return Math.min(Math.max(index, 0), length - 1);
}

function selectionOf(state: UiState): Selection {
  return {
    folders: state.folders,
    presets: state.presets,
    folderIndex: state.folderIndex,
    presetIndex: state.presetIndex,
    notice: state.notice,
    scanError: state.scanError,
  };
}

export function initialState(options: InitialStateOptions): UiState {
  const presetIndex = options.presets.findIndex((p) => p.name === options.presetName);
  return {
    mode: 'browsing',
    folders: options.folders,
    presets: options.presets,
    folderIndex: clamp(options.folderIndex ?? 0, options.folders.length),
    presetIndex: presetIndex >= 0 ? presetIndex : 0,
    scanError: options.scanError,
  };
}

// Extensão dos frames do preset selecionado; a lista de pastas é filtrada por ela
export function selectedExtension(state: UiState): string {
  return state.presets[state.presetIndex].fileExtension;
}

function stay(state: UiState): Transition {
  return { state, effects: [] };
}

function move(state: Focused, delta: number): UiState {
  if (state.mode === 'browsing') {
    return { ...state, folderIndex: clamp(state.folderIndex + delta, state.folders.length) };
  }
  return { ...state, presetIndex: clamp(state.presetIndex + delta, state.presets.length) };
}

// Trocar para um preset com outra extensão pede uma nova varredura
function moved(before: UiState, after: UiState): Transition {
  const extension = selectedExtension(after);
  if (extension === selectedExtension(before)) return stay(after);
  return { state: after, effects: [{ type: 'scan', extension }] };
}

function onSelectionKey(state: Focused, key: KeyName): Transition {
  switch (key) {
    case 'tab':
      return stay(state.mode === 'browsing' ? { ...state, mode: 'presetSelect' } : { ...state, mode: 'browsing' });
    case 'up':
    case 'left':
      return moved(state, move(state, -1));
    case 'down':
    case 'right':
      return moved(state, move(state, 1));
    case 'refresh':
      return { state: { ...state, notice: undefined }, effects: [{ type: 'scan', extension: selectedExtension(state) }] };
    case 'start': {
      if (state.folders.length === 0) {
        return stay({ ...state, notice: 'No folders available' });
      }
      const folder = state.folders[state.folderIndex].name;
      const preset = state.presets[state.presetIndex].name;
      return {
        state: {
          ...selectionOf(state),
          notice: undefined,
          mode: 'converting',
          job: { folder, preset, attempt: 0, spinner: 0, cancelling: false },
        },
        effects: [{ type: 'convert', folder, preset, extension: selectedExtension(state) }],
      };
    }
    default:
      return stay(state);
  }
}

function onKey(state: UiState, key: KeyName): Transition {
  if (key === 'quit') {
    if (state.mode === 'converting') {
      return {
        state: { ...state, job: { ...state.job, cancelling: true } },
        effects: [{ type: 'cancel' }, { type: 'exit' }],
      };
    }
    return { state, effects: [{ type: 'exit' }] };
  }

  switch (state.mode) {
    case 'converting':
      if (key === 'cancel' && !state.job.cancelling) {
        return { state: { ...state, job: { ...state.job, cancelling: true } }, effects: [{ type: 'cancel' }] };
      }
      return stay(state);
    case 'done':
      return stay({ ...selectionOf(state), mode: 'browsing' });
    default:
      return onSelectionKey(state, key);
  }
}

// Keeps the highlighted folder by name across a rescan, else clamps its index.
// A scan made for another preset's extension is stale and dropped.
function applyScan(state: UiState, extension: string, folders: readonly FolderInfo[], error?: string): UiState {
  if (extension !== selectedExtension(state)) return state;
  const previous = state.folders.length > 0 ? state.folders[state.folderIndex].name : undefined;
  const kept = folders.findIndex((f) => f.name === previous);
  return {
    ...state,
    folders,
    folderIndex: kept >= 0 ? kept : clamp(state.folderIndex, folders.length),
    scanError: error,
  };
}

export function transition(state: UiState, event: UiEvent): Transition {
  switch (event.type) {
    case 'key':
      return onKey(state, event.key);
    case 'scanned':
      return stay(applyScan(state, event.extension, event.folders, event.error));
    case 'tick':
      if (state.mode !== 'converting') return stay(state);
      return stay({ ...state, job: { ...state.job, spinner: state.job.spinner + 1 } });
    case 'output':
      if (state.mode !== 'converting') return stay(state);
      return stay({ ...state, job: { ...state.job, lastLine: event.line } });
    case 'attempt':
      if (state.mode !== 'converting') return stay(state);
      return stay({ ...state, job: { ...state.job, codec: event.codec, attempt: event.attempt } });
    case 'jobFinished':
      if (state.mode !== 'converting') return stay(state);
      return stay({ ...selectionOf(state), mode: 'done', summary: event.summary });
  }
}

export function summarizeResult(result: ConversionResult): JobSummary {
  const seconds = (result.durationMs / 1000).toFixed(1);
  const details = [`${result.frameCount} frames, ${result.codec.toUpperCase()} encode, ${seconds}s`];
  if (result.attempts.length > 1) details.push('Hardware encode failed; CPU fallback succeeded.');
  return { status: 'succeeded', message: `Saved ${result.outputPath}`, details };
}

export function summarizeError(err: unknown): JobSummary {
  if (err instanceof FrameReelError && err.code === 'JOB_CANCELLED') {
    return { status: 'cancelled', message: err.message, details: [] };
  }
  if (err instanceof JobFailedError) {
    const last = err.attempts[err.attempts.length - 1];
    return { status: 'failed', message: err.message, details: last ? last.outcome.output.slice(-5) : [] };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { status: 'failed', message, details: [] };
}
