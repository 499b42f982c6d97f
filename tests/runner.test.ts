import { buildEncodePlan } from '../src/command';
import { FallbackPolicy, runWithFallback } from '../src/runner';
import type { EncodingSettings, FrameSequence, ResolvedPreset } from '../src/types';
import { FakeLauncher } from './helpers';

const sequence: FrameSequence = {
  directory: '/renders/shot01',
  prefix: 'frame_',
  digits: 4,
  startNumber: 1,
  extension: 'png',
  frameCount: 3,
};

const preset: ResolvedPreset = {
  name: 'review',
  description: '',
  resolution: '1280x720',
  bitrate: '8M',
  fps: 24,
  fileExtension: 'png',
};

const encoding: EncodingSettings = {
  useGpu: true,
  gpuCodec: 'h264_nvenc',
  cpuCodec: 'libx264',
  gpuPreset: 'p7',
  cpuPreset: 'veryslow',
  tune: 'animation',
  pixelFormat: 'yuv420p',
  keyframeInterval: 60,
  bFrames: 3,
  rcLookahead: 32,
  spatialAq: 1,
  temporalAq: 1,
};

const gpuPlan = buildEncodePlan(sequence, preset, encoding, '/out/shot01.mp4');
const cpuPlan = buildEncodePlan(sequence, preset, { ...encoding, useGpu: false }, '/out/shot01.mp4');

describe('FallbackPolicy', () => {
  it('offers the primary, then the fallback, then nothing', () => {
    const policy = new FallbackPolicy(gpuPlan);
    expect(policy.next(0)?.codec).toBe('gpu');
    expect(policy.next(1)?.codec).toBe('cpu');
    expect(policy.next(2)).toBeUndefined();
  });

  it('stops after the primary without a fallback', () => {
    const policy = new FallbackPolicy(cpuPlan);
    expect(policy.next(1)).toBeUndefined();
  });
});

describe('runWithFallback', () => {
  it('stops after a successful primary', async () => {
    const launcher = new FakeLauncher();
    const outcome = await runWithFallback('/bin/ffmpeg', gpuPlan, launcher);

    expect(outcome.status).toBe('succeeded');
    expect(launcher.calls.map((c) => c.command.codec)).toEqual(['gpu']);
    expect(launcher.calls[0].encoderPath).toBe('/bin/ffmpeg');
  });

  it('falls back to software once after a hardware failure', async () => {
    const launcher = new FakeLauncher([{ exitCode: 1 }]);
    const outcome = await runWithFallback('/bin/ffmpeg', gpuPlan, launcher);

    expect(outcome).toMatchObject({ status: 'succeeded', codec: 'cpu' });
    expect(outcome.attempts.map((a) => [a.codec, a.outcome.exitCode])).toEqual([
      ['gpu', 1],
      ['cpu', 0],
    ]);
  });

  it('fails after exactly one fallback', async () => {
    const launcher = new FakeLauncher([{ exitCode: 1 }, { exitCode: 1 }, { exitCode: 0 }]);
    const outcome = await runWithFallback('/bin/ffmpeg', gpuPlan, launcher);

    expect(outcome.status).toBe('failed');
    expect(launcher.calls).toHaveLength(2);
  });

  it('falls back when the encoder could not be started', async () => {
    const launcher = new FakeLauncher([{ exitCode: null, error: 'spawn EACCES' }]);
    const outcome = await runWithFallback('/bin/ffmpeg', gpuPlan, launcher);

    expect(outcome.status).toBe('succeeded');
    expect(outcome.attempts[0].outcome.error).toBe('spawn EACCES');
  });

  it('does not retry a software-only plan', async () => {
    const launcher = new FakeLauncher([{ exitCode: 1 }]);
    const outcome = await runWithFallback('/bin/ffmpeg', cpuPlan, launcher);

    expect(outcome.status).toBe('failed');
    expect(launcher.calls).toHaveLength(1);
  });

  it('does not fall back after a cancel', async () => {
    const launcher = new FakeLauncher([{ exitCode: null, cancelled: true }]);
    const outcome = await runWithFallback('/bin/ffmpeg', gpuPlan, launcher);

    expect(outcome.status).toBe('cancelled');
    expect(launcher.calls).toHaveLength(1);
  });

  it('records the argv of every attempt and reports progress', async () => {
    const launcher = new FakeLauncher([{ exitCode: 1, output: ['No NVENC capable devices found'] }]);
    const attempts: Array<[string, number]> = [];
    const lines: string[] = [];

    const outcome = await runWithFallback('/bin/ffmpeg', gpuPlan, launcher, {
      onAttempt: (command, attempt) => attempts.push([command.codec, attempt]),
      onOutput: (line) => lines.push(line),
    });

    expect(attempts).toEqual([
      ['gpu', 0],
      ['cpu', 1],
    ]);
    expect(lines).toEqual(['No NVENC capable devices found']);
    expect(outcome.attempts[0].args).toContain('h264_nvenc');
    expect(outcome.attempts[1].args).toContain('libx264');
  });
});
