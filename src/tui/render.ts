import chalk from 'chalk';
import type { EncodingSettings, FolderInfo, ResolvedPreset, Theme } from '../types';
import type { JobSummary, RunningJob, UiState } from './state';

export type Palette = {
  title: (text: string) => string;
  focus: (text: string) => string;
  dim: (text: string) => string;
  selected: (text: string) => string;
  ok: (text: string) => string;
  warn: (text: string) => string;
  error: (text: string) => string;
};

export type RenderView = {
  projectName: string;
  showFileCount: boolean;
  encoding: Pick<EncodingSettings, 'useGpu' | 'gpuCodec' | 'cpuCodec'>;
  columns: number;
  folderRows?: number;
};

const SPINNER = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const DEFAULT_FOLDER_ROWS = 12;

export function createPalette(theme: Theme, level: chalk.Level = chalk.level): Palette {
  const c = new chalk.Instance({ level: theme === 'mono' ? 0 : level });
  return {
    title: c.bold.green,
    focus: c.bold.cyan,
    dim: c.dim,
    selected: c.inverse.bold,
    ok: c.green,
    warn: c.yellow,
    error: c.red,
  };
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

export function formatModified(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function formatDuration(frames: number, fps: number): string {
  const seconds = Math.floor(frames / fps);
  return `~${Math.floor(seconds / 60)}:${pad(seconds % 60)}`;
}

function truncate(text: string, width: number): string {
  if (width <= 1 || text.length <= width) return text;
  return `${text.slice(0, width - 1)}…`;
}

function folderLines(state: UiState, view: RenderView, palette: Palette): string[] {
  const focused = state.mode === 'browsing';
  const lines = [focused ? palette.focus('Folders (↑↓)') : palette.dim('Folders')];

  if (state.folders.length === 0) {
    lines.push(palette.dim('  No sequence folders found'));
  }

  // Scroll so the highlighted folder stays inside the window
  const rows = view.folderRows ?? DEFAULT_FOLDER_ROWS;
  const first = Math.max(0, Math.min(state.folderIndex - rows + 1, state.folders.length - rows));
  const visible = state.folders.slice(first, first + rows);
  const width = Math.max(12, ...visible.map((f) => f.name.length));

  visible.forEach((folder: FolderInfo, offset) => {
    const selected = first + offset === state.folderIndex;
    const count = view.showFileCount ? `  ${String(folder.frameCount).padStart(6)} frames` : '';
    const row = `${selected ? '►' : ' '} ${folder.name.padEnd(width)}${count}  ${formatModified(folder.modifiedAt)}`;
    lines.push(selected ? palette.selected(row) : row);
  });

  if (state.scanError) lines.push(palette.error(`  ${state.scanError}`));
  return lines;
}

function presetLines(state: UiState, palette: Palette): string[] {
  const focused = state.mode === 'presetSelect';
  const lines = [focused ? palette.focus('Presets (↑↓)') : palette.dim('Presets (Tab)')];
  const width = Math.max(...state.presets.map((p) => p.name.length));

  state.presets.forEach((preset: ResolvedPreset, index) => {
    const selected = index === state.presetIndex;
    const description = preset.description ? `  ${preset.description}` : '';
    const row = `${selected ? '►' : ' '} ${preset.name.padEnd(width)}  ${preset.resolution} ${preset.bitrate} ${preset.fps}fps${description}`;
    lines.push(selected && focused ? palette.selected(row) : row);
  });
  return lines;
}

export function encoderLabel(encoding: RenderView['encoding']): string {
  return encoding.useGpu ? `GPU ${encoding.gpuCodec} (CPU ${encoding.cpuCodec} fallback)` : `CPU ${encoding.cpuCodec}`;
}

function previewLines(state: UiState, view: RenderView): string[] {
  const preset = state.presets[state.presetIndex];
  const lines = ['Preview'];

  if (state.folders.length > 0) {
    const folder = state.folders[state.folderIndex];
    lines.push(`  Folder:     ${folder.name}`);
    lines.push(`  Frames:     ${folder.frameCount}`);
    lines.push(`  Duration:   ${formatDuration(folder.frameCount, preset.fps)} @ ${preset.fps}fps`);
  }
  lines.push(`  Resolution: ${preset.resolution}`);
  lines.push(`  Bitrate:    ${preset.bitrate}`);
  lines.push(`  Encoder:    ${encoderLabel(view.encoding)}`);
  return lines;
}

function jobLines(job: RunningJob, view: RenderView, palette: Palette): string[] {
  const codec = job.codec ? ` [${job.codec.toUpperCase()}${job.attempt > 0 ? ' fallback' : ''}]` : '';
  const lines = [palette.focus(`${SPINNER[job.spinner % SPINNER.length]} Converting ${job.folder} with ${job.preset}${codec}`)];
  if (job.cancelling) lines.push(palette.warn('  Cancelling...'));
  if (job.lastLine) lines.push(palette.dim(`  ${truncate(job.lastLine, view.columns - 2)}`));
  lines.push(palette.dim('[Esc] Cancel  [Q] Quit'));
  return lines;
}

function summaryLines(summary: JobSummary, palette: Palette): string[] {
  const heading =
    summary.status === 'succeeded'
      ? palette.ok(`✔ ${summary.message}`)
      : summary.status === 'cancelled'
        ? palette.warn(`■ ${summary.message}`)
        : palette.error(`✖ ${summary.message}`);
  return [heading, ...summary.details.map((d) => palette.dim(`  ${d}`)), palette.dim('Press any key to return...  [Q] Quit')];
}

function statusLines(state: UiState, view: RenderView, palette: Palette): string[] {
  switch (state.mode) {
    case 'converting':
      return jobLines(state.job, view, palette);
    case 'done':
      return summaryLines(state.summary, palette);
    default: {
      const lines = state.notice ? [palette.warn(state.notice)] : [];
      lines.push(palette.dim('[S] Start  [Tab] Switch  [↑↓] Navigate  [R] Refresh  [Q] Quit'));
      return lines;
    }
  }
}

// Desenhar a tela inteira como texto; o loop do terminal limpa e escreve o retorno
export function renderScreen(state: UiState, view: RenderView, palette: Palette): string {
  return [
    palette.title(`framereel · ${view.projectName}`),
    '',
    ...folderLines(state, view, palette),
    '',
    ...presetLines(state, palette),
    '',
    ...previewLines(state, view),
    '',
    ...statusLines(state, view, palette),
  ].join('\n');
}
