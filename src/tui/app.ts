import * as readline from 'node:readline';
import { selectablePresets } from '../config';
import { convertFolder } from '../convertJob';
import { UsageError } from '../errors';
import type { EncoderLauncher } from '../ffmpeg';
import { logger } from '../logger';
import { latestFolderIndex, scanFolders } from '../scanner';
import type { Config, FolderInfo } from '../types';
import { toKeyName } from './keys';
import { createPalette, renderScreen, type RenderView } from './render';
import { initialState, summarizeError, summarizeResult, transition, type Effect, type UiEvent, type UiState } from './state';

export type InteractiveOptions = {
  launcher: EncoderLauncher;
  input?: NodeJS.ReadStream;
  output?: NodeJS.WriteStream;
  // repaint interval while a job runs
  tickMs?: number;
};

const ENTER_SCREEN = '\x1b[?1049h\x1b[?25l';
const LEAVE_SCREEN = '\x1b[?25h\x1b[?1049l';

// Listar só as pastas com frames da extensão do preset escolhido
export async function scanForUi(config: Config, extension: string): Promise<{ folders: FolderInfo[]; error?: string }> {
  const scan = await scanFolders(config.rendersFolder, {
    extension,
    requireFrames: true,
  });
  return { folders: scan.folders, error: scan.error?.message };
}

// Função que roda a interface em tela cheia até o usuário sair; resolve depois de restaurar o terminal
export async function runInteractive(config: Config, options: InteractiveOptions): Promise<void> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  if (!input.isTTY) {
    throw new UsageError('The interactive front end needs a terminal on stdin; use "framereel convert" instead.');
  }

  // Carregar presets e a primeira varredura com a extensão do preset inicial
  const presets = selectablePresets(config);
  const first = presets.find((p) => p.name === config.defaults.presetName) ?? presets[0];
  const scan = await scanForUi(config, first.fileExtension);
  let state: UiState = initialState({
    folders: scan.folders,
    presets,
    scanError: scan.error,
    folderIndex: config.ui.autoSelectLatest ? latestFolderIndex(scan.folders) : 0,
    presetName: first.name,
  });

  const palette = createPalette(config.ui.theme);
  const view = (): RenderView => ({
    projectName: config.projectName,
    showFileCount: config.ui.showFileCount,
    encoding: config.encoding,
    columns: output.columns ?? 80,
  });

  logger.info({ folders: scan.folders.length, presets: presets.length }, 'Interactive front end started');

  return new Promise<void>((resolve, reject) => {
    let closed = false;
    let controller: AbortController | undefined;
    let ticker: NodeJS.Timeout | undefined;

    const paint = () => {
      if (closed) return;
      readline.cursorTo(output, 0, 0);
      readline.clearScreenDown(output);
      output.write(`${renderScreen(state, view(), palette)}\n`);
    };

    const close = (err?: unknown) => {
      if (closed) return;
      closed = true;
      if (ticker) clearInterval(ticker);
      input.removeListener('keypress', onKeypress);
      input.setRawMode(false);
      input.pause();
      output.write(LEAVE_SCREEN);
      if (err) reject(err);
      else resolve();
    };

    const dispatch = (event: UiEvent) => {
      if (closed) return;
      const next = transition(state, event);
      state = next.state;
      paint();
      next.effects.forEach(run);
    };

    const startJob = (folder: string, preset: string, extension: string) => {
      const job = new AbortController();
      controller = job;
      ticker = setInterval(() => dispatch({ type: 'tick' }), options.tickMs ?? 120);

      convertFolder(config, { folder, preset, extension }, {
        launcher: options.launcher,
        signal: job.signal,
        onAttempt: (command, attempt) => dispatch({ type: 'attempt', codec: command.codec, attempt }),
        onOutput: (line) => dispatch({ type: 'output', line }),
      })
        .then(summarizeResult, (err: unknown) => {
          logger.error({ err, folder, preset }, 'Interactive conversion failed');
          return summarizeError(err);
        })
        .then((summary) => {
          if (ticker) clearInterval(ticker);
          ticker = undefined;
          controller = undefined;
          dispatch({ type: 'jobFinished', summary });
        })
        .catch(close);
    };

    function run(effect: Effect): void {
      switch (effect.type) {
        case 'scan':
          scanForUi(config, effect.extension)
            .then((result) =>
              dispatch({ type: 'scanned', extension: effect.extension, folders: result.folders, error: result.error }),
            )
            .catch(close);
          break;
        case 'convert':
          startJob(effect.folder, effect.preset, effect.extension);
          break;
        case 'cancel':
          controller?.abort();
          break;
        case 'exit':
          close();
          break;
      }
    }

    function onKeypress(text: string | undefined, key: readline.Key | undefined): void {
      dispatch({ type: 'key', key: toKeyName(text, key) });
    }

    readline.emitKeypressEvents(input);
    input.setRawMode(true);
    input.resume();
    input.on('keypress', onKeypress);
    output.write(ENTER_SCREEN);
    paint();
  });
}
