import pino from 'pino';
import { env } from './env';

// stdout belongs to command output and the interactive screen, so logs go to
// stderr unless a log file is configured
const destination = env.LOG_FILE
  ? pino.destination({ dest: env.LOG_FILE, mkdir: true, sync: false })
  : pino.destination(2);

export const logger = pino(
  {
    name: 'framereel',
    level: env.LOG_LEVEL,
    base: { pid: process.pid },
  },
  destination,
);

export function hasLogFile(): boolean {
  return env.LOG_FILE !== undefined;
}
