import ffmpegInstaller from '@ffmpeg-installer/ffmpeg';
import path from 'node:path';

import { encoderExists, exitCodeFromError, FluentFfmpegLauncher, resolveEncoderPath } from '../src/ffmpeg';
import { makeProject, removeDir } from './helpers';

describe('encoder path', () => {
  it('maps the bundled marker to the installed binary', () => {
    expect(resolveEncoderPath('bundled')).toBe(ffmpegInstaller.path);
    expect(resolveEncoderPath('/opt/ffmpeg/bin/ffmpeg')).toBe('/opt/ffmpeg/bin/ffmpeg');
  });

  it('checks that the binary exists', async () => {
    const project = await makeProject();
    try {
      expect(await encoderExists(project.ffmpegPath)).toBe(true);
      expect(await encoderExists(path.join(project.root, 'bin', 'nope'))).toBe(false);
    } finally {
      await removeDir(project.root);
    }
  });
});

describe('exitCodeFromError', () => {
  it('reads the exit code from the error message', () => {
    expect(exitCodeFromError(new Error('ffmpeg exited with code 187: Conversion failed!'))).toBe(187);
  });

  it('returns null when the process never exited', () => {
    expect(exitCodeFromError(new Error('spawn /bin/ffmpeg ENOENT'))).toBeNull();
  });
});

describe('FluentFfmpegLauncher', () => {
  it('does not start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    const outcome = await new FluentFfmpegLauncher().launch(
      '/bin/ffmpeg',
      { codec: 'cpu', input: '/r/f_%04d.png', inputOptions: [], outputOptions: [], output: '/out/x.mp4' },
      { signal: controller.signal },
    );

    expect(outcome).toEqual({ exitCode: null, output: [], cancelled: true });
  });
});
