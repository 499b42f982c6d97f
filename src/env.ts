import 'dotenv/config';
import path from 'node:path';
import { z } from 'zod';

const schema = z.object({
  // Path of the JSON project configuration, relative to the working directory
  FRAMEREEL_CONFIG: z.string().min(1).default('config.json'),
  // Template copied by `framereel init`
  FRAMEREEL_TEMPLATE: z.string().min(1).default(path.resolve(__dirname, '..', 'config.example.json')),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  LOG_FILE: z.string().min(1).optional(),
});

export type Env = z.infer<typeof schema>;

export const env: Env = schema.parse(process.env);
