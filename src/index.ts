#!/usr/bin/env node
import process from 'node:process';
import { createInterruptHandler, runCli } from './cli';
import { env } from './env';
import { FluentFfmpegLauncher } from './ffmpeg';
import { logger } from './logger';

async function main() {
  const controller = new AbortController();

  // Primeiro Ctrl+C cancela o encode (ou sai se não há job); o segundo usa a saída padrão
  process.once(
    'SIGINT',
    createInterruptHandler(controller, (code) => process.exit(code)),
  );

  process.exitCode = await runCli(process.argv.slice(2), {
    launcher: new FluentFfmpegLauncher(),
    io: {
      out: (line) => process.stdout.write(`${line}\n`),
      err: (line) => process.stderr.write(`${line}\n`),
    },
    configPath: env.FRAMEREEL_CONFIG,
    templatePath: env.FRAMEREEL_TEMPLATE,
    signal: controller.signal,
  });
}

main().catch((err) => {
  logger.fatal({ err }, 'framereel crashed');
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
