import { toArgs } from './command';
import type { EncoderLauncher } from './ffmpeg';
import { logger } from './logger';
import type { AttemptResult, EncodePlan, EncoderCommand, JobOutcome } from './types';

// Estratégias de encode em ordem: a principal e no máximo um fallback
export class FallbackPolicy {
  private readonly strategies: EncoderCommand[];

  constructor(plan: EncodePlan) {
    this.strategies = plan.fallback ? [plan.primary, plan.fallback] : [plan.primary];
  }

  next(attempted: number): EncoderCommand | undefined {
    return this.strategies[attempted];
  }
}

export type RunOptions = {
  signal?: AbortSignal;
  onAttempt?: (command: EncoderCommand, attempt: number) => void;
  onOutput?: (line: string) => void;
};

// Função que roda as estratégias em ordem até uma passar, ser cancelada ou acabarem
export async function runWithFallback(
  encoderPath: string,
  plan: EncodePlan,
  launcher: EncoderLauncher,
  options: RunOptions = {},
): Promise<JobOutcome> {
  const policy = new FallbackPolicy(plan);
  const attempts: AttemptResult[] = [];

  for (let command = policy.next(0); command; command = policy.next(attempts.length)) {
    if (attempts.length > 0) {
      logger.warn({ from: attempts[attempts.length - 1].codec, to: command.codec }, 'Encode failed, retrying with fallback encoder');
    }
    options.onAttempt?.(command, attempts.length);

    // Executar a tentativa
    const startedAt = Date.now();
    const outcome = await launcher.launch(encoderPath, command, {
      signal: options.signal,
      onOutput: options.onOutput,
    });
    attempts.push({ codec: command.codec, args: toArgs(command), outcome, durationMs: Date.now() - startedAt });

    // Cancelamento nunca cai para o fallback
    if (outcome.cancelled) {
      return { status: 'cancelled', attempts };
    }
    if (outcome.exitCode === 0) {
      return { status: 'succeeded', codec: command.codec, attempts };
    }

    logger.error(
      { codec: command.codec, exitCode: outcome.exitCode, error: outcome.error, output: outcome.output.slice(-20) },
      'Encoder attempt failed',
    );
  }

  return { status: 'failed', attempts };
}
