import fs from 'node:fs/promises';
import path from 'node:path';

import { validateEnvironment } from '../src/validate';
import { baseDocument, frameNames, makeProject, makeTempDir, removeDir, writeFrames } from './helpers';

describe('validateEnvironment', () => {
  const roots: string[] = [];

  afterEach(async () => {
    await Promise.all(roots.splice(0).map(removeDir));
  });

  it('passes a complete project', async () => {
    const project = await makeProject();
    roots.push(project.root);
    await writeFrames(path.join(project.rendersFolder, 'shot01'), frameNames('frame_', 3, 'jpeg'));
    await writeFrames(path.join(project.rendersFolder, 'empty'), []);

    const report = await validateEnvironment(project.configPath);

    expect(report.ok).toBe(true);
    expect(report.problems).toEqual([]);
    expect(report.notes).toEqual([
      '1 sequence folder(s) with *.jpeg frames found.',
      `Output folder ${project.outputFolder} will be created on first conversion.`,
      '2 preset(s) loaded.',
    ]);
  });

  it('collects every missing path at once', async () => {
    const project = await makeProject(
      baseDocument({ ffmpeg_path: 'bin/none', renders_folder: 'gone', auto_create_output: false }),
    );
    roots.push(project.root);

    const report = await validateEnvironment(project.configPath);

    expect(report.ok).toBe(false);
    expect(report.problems.map((p) => [p.code, p.key])).toEqual([
      ['ENCODER_NOT_FOUND', 'ffmpeg_path'],
      ['RENDERS_FOLDER_MISSING', 'renders_folder'],
      ['OUTPUT_FOLDER_MISSING', 'output_folder'],
    ]);
    expect(report.problems[0].message).toBe(`FFmpeg not found at ${path.join(project.root, 'bin', 'none')}`);
  });

  it('reports each invalid key', async () => {
    const project = await makeProject(
      baseDocument({ project_name: '', output_naming: 'daily' }),
    );
    roots.push(project.root);

    const report = await validateEnvironment(project.configPath);

    expect(report.ok).toBe(false);
    expect(report.config).toBeUndefined();
    expect(report.problems.map((p) => p.key).sort()).toEqual(['output_naming', 'project_name']);
    expect(report.problems.every((p) => p.code === 'CONFIG_INVALID')).toBe(true);
  });

  it('reports a missing configuration file', async () => {
    const dir = await makeTempDir();
    roots.push(dir);
    const configPath = path.join(dir, 'config.json');

    const report = await validateEnvironment(configPath);

    expect(report.problems).toEqual([
      {
        code: 'CONFIG_MISSING',
        message: `Configuration file not found at ${configPath}. Run "framereel init" to create one.`,
      },
    ]);
  });

  it('does not flag an existing output folder', async () => {
    const project = await makeProject(baseDocument({ auto_create_output: false, presets: [] }));
    roots.push(project.root);
    await fs.mkdir(project.outputFolder);

    const report = await validateEnvironment(project.configPath);

    expect(report.ok).toBe(true);
    expect(report.notes).toEqual(['0 sequence folder(s) with *.jpeg frames found.']);
  });
});
