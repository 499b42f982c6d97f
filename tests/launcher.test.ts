import { EventEmitter } from 'node:events';

import { FluentFfmpegLauncher } from '../src/ffmpeg';
import type { EncoderCommand } from '../src/types';

// Stands in for a fluent-ffmpeg command: events are emitted by the test, and
// kill only reaches a process after 'start'
class MockFfmpegCommand extends EventEmitter {
  started = false;
  killed: string[] = [];

  setFfmpegPath(): this {
    return this;
  }

  input(): this {
    return this;
  }

  inputOptions(): this {
    return this;
  }

  outputOptions(): this {
    return this;
  }

  output(): this {
    return this;
  }

  run(): void {}

  spawn(): void {
    this.started = true;
    this.emit('start', 'ffmpeg -i in.png out.mp4');
  }

  kill(signal: string): this {
    if (!this.started) return this;
    this.killed.push(signal);
    this.emit('error', new Error(`ffmpeg was killed with signal ${signal}`));
    return this;
  }
}

const mockCommands: MockFfmpegCommand[] = [];

jest.mock('fluent-ffmpeg', () =>
  jest.fn(() => {
    const command = new MockFfmpegCommand();
    mockCommands.push(command);
    return command;
  }),
);

const COMMAND: EncoderCommand = {
  codec: 'gpu',
  input: '/r/shot/f_%04d.png',
  inputOptions: ['-f', 'image2'],
  outputOptions: ['-c:v', 'h264_nvenc'],
  output: '/out/shot.mp4',
};

function lastCommand(): MockFfmpegCommand {
  const command = mockCommands[mockCommands.length - 1];
  if (!command) throw new Error('ffmpeg was not invoked');
  return command;
}

describe('FluentFfmpegLauncher process lifecycle', () => {
  beforeEach(() => {
    mockCommands.length = 0;
  });

  it('kills the process once it starts when cancelled before spawn', async () => {
    const controller = new AbortController();
    const pending = new FluentFfmpegLauncher().launch('/bin/ffmpeg', COMMAND, { signal: controller.signal });

    controller.abort();
    const command = lastCommand();
    command.spawn();

    expect(await pending).toEqual({ exitCode: null, output: [], cancelled: true });
    expect(command.killed).toEqual(['SIGKILL']);
  });

  it('reports a cancel even when the process ends cleanly afterwards', async () => {
    const controller = new AbortController();
    const pending = new FluentFfmpegLauncher().launch('/bin/ffmpeg', COMMAND, { signal: controller.signal });

    controller.abort();
    lastCommand().emit('end');

    expect(await pending).toEqual({ exitCode: null, output: [], cancelled: true });
  });

  it('kills a running process on cancel', async () => {
    const controller = new AbortController();
    const pending = new FluentFfmpegLauncher().launch('/bin/ffmpeg', COMMAND, { signal: controller.signal });
    const command = lastCommand();
    command.spawn();

    controller.abort();

    expect(await pending).toEqual({ exitCode: null, output: [], cancelled: true });
    expect(command.killed).toEqual(['SIGKILL']);
  });

  it('collects stderr and resolves with exit code 0 on success', async () => {
    const lines: string[] = [];
    const pending = new FluentFfmpegLauncher().launch('/bin/ffmpeg', COMMAND, { onOutput: (line) => lines.push(line) });
    const command = lastCommand();
    command.spawn();
    command.emit('stderr', 'frame=    1 fps=0.0');
    command.emit('end');

    expect(await pending).toEqual({ exitCode: 0, output: ['frame=    1 fps=0.0'], cancelled: false });
    expect(lines).toEqual(['frame=    1 fps=0.0']);
  });

  it('reads the exit code of a failed run', async () => {
    const pending = new FluentFfmpegLauncher().launch('/bin/ffmpeg', COMMAND);
    const command = lastCommand();
    command.spawn();
    command.emit('error', new Error('ffmpeg exited with code 1: Unknown encoder'));

    const outcome = await pending;
    expect(outcome.exitCode).toBe(1);
    expect(outcome.cancelled).toBe(false);
    expect(outcome.error).toBeUndefined();
  });

  it('keeps the message of a spawn failure', async () => {
    const pending = new FluentFfmpegLauncher().launch('/bin/ffmpeg', COMMAND);
    lastCommand().emit('error', new Error('spawn /bin/ffmpeg ENOENT'));

    expect(await pending).toEqual({
      exitCode: null,
      output: [],
      cancelled: false,
      error: 'spawn /bin/ffmpeg ENOENT',
    });
  });
});
