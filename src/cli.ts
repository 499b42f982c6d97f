import chalk from 'chalk';
import { Command, CommanderError } from 'commander';
import { getEventListeners } from 'node:events';
import { initConfig, loadConfig, normalizeExtension, resolvePreset, selectablePresets } from './config';
import { convertFolder, prepareConversion } from './convertJob';
import { toArgs } from './command';
import { FrameReelError, UsageError } from './errors';
import type { EncoderLauncher } from './ffmpeg';
import { hasLogFile, logger } from './logger';
import { scanFolders } from './scanner';
import { runInteractive, type InteractiveOptions } from './tui/app';
import { createPalette, type Palette } from './tui/render';
import type { Config, EncoderCommand } from './types';
import { validateEnvironment } from './validate';

export const VERSION = '0.1.0';

export type CliIo = {
  out: (line: string) => void;
  err: (line: string) => void;
};

export type CliDeps = {
  launcher: EncoderLauncher;
  io: CliIo;
  configPath: string;
  templatePath: string;
  now?: () => Date;
  signal?: AbortSignal;
  colorLevel?: chalk.Level;
  interactive?: (config: Config, options: InteractiveOptions) => Promise<void>;
};

type ConvertOptions = {
  folder?: string;
  preset?: string;
  extension?: string;
  dryRun?: boolean;
};

// Exit code of a process ended by Ctrl+C
export const INTERRUPTED_EXIT_CODE = 130;

// Função que trata o Ctrl+C: cancela o encode em andamento, ou sai na hora
// quando nenhum job está escutando o sinal
export function createInterruptHandler(controller: AbortController, exit: (code: number) => void): () => void {
  return () => {
    if (getEventListeners(controller.signal, 'abort').length === 0) {
      logger.info({ signal: 'SIGINT' }, 'Interrupted with no running job');
      exit(INTERRUPTED_EXIT_CODE);
      return;
    }
    logger.info({ signal: 'SIGINT' }, 'Cancelling running job');
    controller.abort();
  };
}

function quote(arg: string): string {
  return /[\s"']/.test(arg) ? JSON.stringify(arg) : arg;
}

function formatInvocation(encoderPath: string, command: EncoderCommand): string {
  return [encoderPath, ...toArgs(command)].map(quote).join(' ');
}

async function selectFolder(config: Config, requested: string | undefined, extension: string): Promise<string> {
  const scan = await scanFolders(config.rendersFolder, { extension, requireFrames: requested === undefined });
  if (scan.error) throw scan.error;

  const names = scan.folders.map((f) => f.name);
  if (requested !== undefined) {
    if (!names.includes(requested)) {
      throw new UsageError(`Folder '${requested}' not found in ${config.rendersFolder} (available: ${names.join(', ') || 'none'})`);
    }
    return requested;
  }

  if (names.length === 1) return names[0];
  if (names.length === 0) {
    throw new UsageError(`No folders with *.${extension} frames found in ${config.rendersFolder}`);
  }
  throw new UsageError(`Several sequence folders found (${names.join(', ')}); choose one with --folder`);
}

async function convertCommand(
  config: Config,
  folderArg: string | undefined,
  options: ConvertOptions,
  deps: CliDeps,
  palette: Palette,
): Promise<number> {
  if (folderArg !== undefined && options.folder !== undefined && folderArg !== options.folder) {
    throw new UsageError(`Conflicting folders '${folderArg}' and '${options.folder}'; name only one`);
  }

  const preset = resolvePreset(config, options.preset);
  const extension = options.extension ? normalizeExtension(options.extension) : preset.fileExtension;
  const folder = await selectFolder(config, options.folder ?? folderArg, extension);
  const request = { folder, preset: options.preset, extension: options.extension };
  const now = deps.now ?? (() => new Date());

  if (options.dryRun) {
    const job = await prepareConversion(config, request, now());
    deps.io.out(`Folder: ${job.folder} (${job.sequence.frameCount} frames)`);
    deps.io.out(`Preset: ${job.preset.name}`);
    deps.io.out(`Output: ${job.outputPath}`);
    deps.io.out(`${job.plan.primary.codec.toUpperCase()}: ${formatInvocation(job.encoderPath, job.plan.primary)}`);
    if (job.plan.fallback) {
      deps.io.out(`${job.plan.fallback.codec.toUpperCase()} fallback: ${formatInvocation(job.encoderPath, job.plan.fallback)}`);
    }
    return 0;
  }

  deps.io.out(`Converting ${folder} with preset ${preset.name} (${preset.resolution} @ ${preset.fps}fps, ${preset.bitrate})`);
  const result = await convertFolder(config, request, {
    launcher: deps.launcher,
    now,
    signal: deps.signal,
    onAttempt: (command, attempt) => {
      if (attempt > 0) deps.io.err(palette.warn(`Encode failed, retrying with ${command.codec.toUpperCase()} encoding...`));
      else deps.io.out(`Encoding with ${command.codec.toUpperCase()}...`);
    },
  });

  deps.io.out(palette.ok(`Conversion complete: ${result.outputPath}`));
  return 0;
}

function listPresetsCommand(config: Config, deps: CliDeps): number {
  if (config.presets.length === 0) {
    const d = config.defaults;
    deps.io.out(`No presets defined; conversions use the defaults (${d.resolution}, ${d.bitrate}, ${d.fps}fps)`);
    return 0;
  }
  deps.io.out('Available presets:');
  for (const preset of selectablePresets(config)) {
    const description = preset.description ? `: ${preset.description}` : '';
    deps.io.out(`- ${preset.name}${description} (${preset.resolution}, ${preset.bitrate}, ${preset.fps}fps)`);
  }
  return 0;
}

async function initCommand(target: string, force: boolean, deps: CliDeps): Promise<number> {
  const result = await initConfig(target, deps.templatePath, { force });
  switch (result) {
    case 'exists':
      deps.io.out(`${target} already exists. Use --force to overwrite it.`);
      break;
    case 'overwritten':
      deps.io.out(`Overwrote ${target} from ${deps.templatePath}.`);
      break;
    case 'created':
      deps.io.out(`Created ${target} from ${deps.templatePath}. Edit it for your project.`);
      break;
  }
  return 0;
}

async function validateCommand(configPath: string, deps: CliDeps, palette: Palette): Promise<number> {
  const report = await validateEnvironment(configPath);
  for (const note of report.notes) deps.io.out(`• ${note}`);
  for (const problem of report.problems) deps.io.err(palette.error(`✖ ${problem.message}`));

  if (report.ok) {
    deps.io.out(palette.ok('Configuration validated successfully!'));
    return 0;
  }
  deps.io.err(palette.error(`${report.problems.length} problem(s) found.`));
  return 1;
}

function createProgram(deps: CliDeps, palette: Palette, setExitCode: (code: number) => void): Command {
  const program = new Command();

  // Must come before the subcommands are added: they copy these settings
  program
    .name('framereel')
    .description('Convert rendered image sequence folders into MP4 videos with ffmpeg.')
    .version(VERSION)
    .option('-c, --config <path>', 'path to the configuration file', deps.configPath)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.io.out(text.replace(/\n$/, '')),
      writeErr: (text) => deps.io.err(text.replace(/\n$/, '')),
    })
    .showHelpAfterError();

  const configPath = () => program.opts<{ config: string }>().config;

  program
    .command('convert')
    .description('convert one sequence folder to MP4')
    .argument('[folder]', 'folder name inside renders_folder')
    .option('-f, --folder <name>', 'folder name inside renders_folder')
    .option('-p, --preset <name>', 'preset from the configuration')
    .option('-e, --extension <ext>', 'frame file extension, overriding the preset')
    .option('--dry-run', 'print the encoder invocations without running them')
    .action(async (folderArg: string | undefined, options: ConvertOptions) => {
      const config = await loadConfig(configPath());
      setExitCode(await convertCommand(config, folderArg, options, deps, palette));
    });

  program
    .command('list-presets')
    .description('list the presets defined in the configuration')
    .action(async () => {
      const config = await loadConfig(configPath());
      setExitCode(listPresetsCommand(config, deps));
    });

  program
    .command('init')
    .description('create a configuration file from the template')
    .option('--force', 'overwrite an existing configuration file')
    .action(async (options: { force?: boolean }) => {
      setExitCode(await initCommand(configPath(), options.force === true, deps));
    });

  program
    .command('validate')
    .description('check the configuration and the folders it names')
    .action(async () => {
      setExitCode(await validateCommand(configPath(), deps, palette));
    });

  program
    .command('gui')
    .description('open the interactive terminal front end')
    .action(async () => {
      const config = await loadConfig(configPath());
      // pino on stderr would tear the full-screen view
      if (!hasLogFile()) logger.level = 'silent';
      await (deps.interactive ?? runInteractive)(config, { launcher: deps.launcher });
      setExitCode(0);
    });

  return program;
}

// Função principal da CLI: recebe argv sem node e script, resolve com o exit code
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const palette = createPalette('classic', deps.colorLevel);
  let exitCode = 0;
  const program = createProgram(deps, palette, (code) => {
    exitCode = code;
  });

  // Rodar o comando escolhido
  try {
    await program.parseAsync(argv, { from: 'user' });
    return exitCode;
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') return 0;
      return 2;
    }
    // Erros conhecidos saem com o próprio exit code
    if (err instanceof FrameReelError) {
      deps.io.err(palette.error(`Error: ${err.message}`));
      if (err instanceof UsageError) deps.io.err('Run "framereel --help" for usage.');
      return err.exitCode;
    }
    logger.error({ err, argv }, 'Unexpected failure');
    deps.io.err(palette.error(`Error: ${err instanceof Error ? err.message : String(err)}`));
    return 1;
  }
}
