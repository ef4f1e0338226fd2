import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { createManifest } from '../../src/manifest/manifest.js';
import { loadManifest, manifestPath, saveManifest } from '../../src/manifest/store.js';
import { MalformedManifestError } from '../../src/exception/errors.js';

describe('manifest store', () => {
  let dir: string;

  beforeEach(async () => {
    dir = join(tmpdir(), `manifest-store-test-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('round-trips every field', async () => {
    const manifest = createManifest({
      workflowName: 'viewer_screenshots',
      description: 'Screenshot the benchmark viewer',
      version: '2.1.0',
      recordedAt: '2026-10-01T12:00:00.000Z',
      recordedBy: 'test-user',
      inputParameters: { html_path: 'string', viewport: 'string' },
      outputArtifacts: ['screenshots/*.png', 'report.md'],
      dependencies: ['playwright'],
      recordingPath: '/recordings/viewer_screenshots',
    });
    const path = join(dir, 'manifest.json');

    await saveManifest(manifest, path);
    const loaded = await loadManifest(path);

    expect(loaded).toEqual(manifest);
  });

  it('writes indented snake_case JSON', async () => {
    const manifest = createManifest({
      workflowName: 'wf',
      description: 'd',
      recordedAt: '2026-10-01T12:00:00.000Z',
    });
    const path = join(dir, 'manifest.json');

    await saveManifest(manifest, path);
    const text = await readFile(path, 'utf-8');

    expect(text.split('\n')[1]).toBe('  "workflow_name": "wf",');
    expect(JSON.parse(text)).toEqual({
      workflow_name: 'wf',
      description: 'd',
      version: '1.0.0',
      recorded_at: '2026-10-01T12:00:00.000Z',
      recorded_by: '',
      input_parameters: {},
      output_artifacts: [],
      dependencies: [],
      recording_path: '',
    });
  });

  it('overwrites an existing manifest', async () => {
    const path = join(dir, 'manifest.json');
    await saveManifest(createManifest({ workflowName: 'first', description: 'a' }), path);
    await saveManifest(createManifest({ workflowName: 'second', description: 'b' }), path);

    const loaded = await loadManifest(path);
    expect(loaded.workflowName).toBe('second');
  });

  it('rejects when the target directory does not exist', async () => {
    const path = join(dir, 'missing', 'manifest.json');
    await expect(
      saveManifest(createManifest({ workflowName: 'wf', description: 'd' }), path),
    ).rejects.toThrow();
  });

  it('fills defaults for optional fields', async () => {
    const path = join(dir, 'manifest.json');
    await writeFile(path, JSON.stringify({ workflow_name: 'minimal', description: 'only required' }));

    const loaded = await loadManifest(path);

    expect(loaded.version).toBe('1.0.0');
    expect(loaded.recordedBy).toBe('');
    expect(loaded.inputParameters).toEqual({});
    expect(loaded.outputArtifacts).toEqual([]);
    expect(loaded.dependencies).toEqual([]);
    expect(loaded.recordingPath).toBe('');
    expect(Number.isNaN(Date.parse(loaded.recordedAt))).toBe(false);
  });

  it('throws MalformedManifestError on invalid JSON', async () => {
    const path = join(dir, 'manifest.json');
    await writeFile(path, 'not json');

    await expect(loadManifest(path)).rejects.toBeInstanceOf(MalformedManifestError);
  });

  it('throws MalformedManifestError naming the missing field', async () => {
    const path = join(dir, 'manifest.json');
    await writeFile(path, JSON.stringify({ description: 'no name' }));

    await expect(loadManifest(path)).rejects.toThrow(/workflow_name: Required/);
  });

  it('rejects non-string parameter type tags', async () => {
    const path = join(dir, 'manifest.json');
    await writeFile(
      path,
      JSON.stringify({ workflow_name: 'wf', description: 'd', input_parameters: { count: 3 } }),
    );

    await expect(loadManifest(path)).rejects.toThrow(/input_parameters\.count/);
  });

  it('rejects a missing file with ENOENT', async () => {
    await expect(loadManifest(join(dir, 'nope.json'))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('builds the manifest path from the recordings root', () => {
    expect(manifestPath('recordings', 'wf')).toBe(join('recordings', 'wf', 'manifest.json'));
  });
});
