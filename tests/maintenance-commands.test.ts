import { beforeEach, describe, expect, it } from 'vitest';

import { runCleanupCommand } from '../src/cli/commands/cleanup.js';
import { runSizeCommand } from '../src/cli/commands/size.js';
import { setRenderer } from '../src/cli/ui/renderer.js';
import { HarnessConfigSchema } from '../src/config/schema.js';
import { RuntimeCommandError } from '../src/runtime/errors.js';
import { FakeRuntime } from './fake-runtime.js';
import { RecordingRenderer } from './recording-renderer.js';

const config = HarnessConfigSchema.parse({
  image: { name: 'app', tag: 'test' },
  container: { name: 'app-test' },
});

let renderer: RecordingRenderer;

beforeEach(() => {
  renderer = new RecordingRenderer();
  setRenderer(renderer);
});

describe('dockcheck cleanup', () => {
  it('succeeds when there is nothing to remove', async () => {
    const res = await runCleanupCommand({ config, runtime: new FakeRuntime() });
    expect(res).toEqual({ ok: true });
    expect(renderer.calls('info')).toEqual([['No container named app-test; nothing to do']]);
  });

  it('stops and removes the configured container', async () => {
    const runtime = new FakeRuntime({ existing: ['app-test', 'other'] });
    const res = await runCleanupCommand({ config, runtime });
    expect(res.ok).toBe(true);
    expect([...runtime.instances.keys()]).toEqual(['other']);
    expect(renderer.calls('success')).toEqual([['Stopped and removed app-test']]);
  });

  it('reports runtime failures', async () => {
    const runtime = new FakeRuntime({
      existing: ['app-test'],
      stopError: new RuntimeCommandError('docker stop app-test', 1, 'permission denied'),
    });
    await expect(runCleanupCommand({ config, runtime })).resolves.toEqual({
      ok: false,
      details: 'docker stop app-test exited with code 1: permission denied',
    });
  });
});

describe('dockcheck size', () => {
  it('checks an existing image against the target', async () => {
    const res = await runSizeCommand({ config, runtime: new FakeRuntime() });
    expect(res).toEqual({ ok: true, metadata: { sizeRaw: '650MB', sizeMb: 650, sizeClass: 'under_threshold' } });
    expect(renderer.calls('success')).toEqual([['Under the 1000 MB target']]);
    expect(renderer.calls('dim')).toEqual([['~2.8 GB smaller than the 3.4 GB reference image']]);
  });

  it('warns when the image is over the target', async () => {
    const runtime = new FakeRuntime({ image: { repository: 'app', tag: 'test', size: '2.5GB', createdAt: 'now', id: 'x' } });
    const res = await runSizeCommand({ config, runtime });
    expect(res.metadata?.sizeClass).toBe('over_threshold');
    expect(renderer.calls('warn')).toEqual([['Larger than the 1000 MB target']]);
  });

  it('fails when the image has not been built', async () => {
    const res = await runSizeCommand({ config, runtime: new FakeRuntime({ image: null }) });
    expect(res).toEqual({ ok: false, details: 'Image app:test not found. Build it first with `dockcheck verify`.' });
  });
});
