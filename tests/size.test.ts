import { describe, expect, it } from 'vitest';

import { classifySize, describeArtifact, estimateSavingsMb, inspectImageSize, parseSizeMb } from '../src/core/size.js';
import { FakeRuntime } from './fake-runtime.js';

const image = { name: 'app', tag: 'test' };

describe('parseSizeMb', () => {
  it('normalizes runtime size strings to megabytes', () => {
    expect(parseSizeMb('650MB')).toBe(650);
    expect(parseSizeMb('1.2GB')).toBeCloseTo(1228.8, 6);
    expect(parseSizeMb('12.5kB')).toBeCloseTo(12.5 / 1024, 9);
    expect(parseSizeMb('2TB')).toBe(2 * 1024 * 1024);
    expect(parseSizeMb(' 300 mb ')).toBe(300);
  });

  it('treats a bare number as megabytes', () => {
    expect(parseSizeMb('512')).toBe(512);
  });

  it('reads its own output back to the same value', () => {
    for (const raw of ['1B', '512B', '12.5kB', '650MB', '1.2GB', '2TB', '0.5', '.75GB']) {
      const mb = parseSizeMb(raw);
      expect(mb).not.toBeNull();
      expect(parseSizeMb(String(mb))).toBe(mb);
    }
  });

  it('accepts exponent notation', () => {
    expect(parseSizeMb('9.5367431640625e-7')).toBe(9.5367431640625e-7);
    expect(parseSizeMb('1e3MB')).toBe(1000);
  });

  it('returns null for anything it cannot read', () => {
    expect(parseSizeMb('5e')).toBeNull();
    expect(parseSizeMb('5e+')).toBeNull();
    expect(parseSizeMb('')).toBeNull();
    expect(parseSizeMb('abc')).toBeNull();
    expect(parseSizeMb('10PB')).toBeNull();
    expect(parseSizeMb('1.2.3GB')).toBeNull();
  });
});

describe('classifySize', () => {
  it('is strictly below the threshold for under_threshold', () => {
    expect(classifySize(650, 1000)).toBe('under_threshold');
    expect(classifySize(1000, 1000)).toBe('over_threshold');
    expect(classifySize(1228.8, 1000)).toBe('over_threshold');
  });

  it('is unknown without a size', () => {
    expect(classifySize(null, 1000)).toBe('unknown');
  });
});

describe('describeArtifact', () => {
  it('describes the same size string the same way every time', () => {
    const first = describeArtifact('650MB', 1000);
    expect(first).toEqual({ sizeRaw: '650MB', sizeMb: 650, sizeClass: 'under_threshold' });
    expect(describeArtifact('650MB', 1000)).toEqual(first);
  });

  it('keeps the raw string when it cannot be parsed', () => {
    expect(describeArtifact('huge', 1000)).toEqual({ sizeRaw: 'huge', sizeMb: null, sizeClass: 'unknown' });
  });
});

describe('estimateSavingsMb', () => {
  it('reports the difference only when the image is smaller than the reference', () => {
    expect(estimateSavingsMb({ sizeRaw: '650MB', sizeMb: 650, sizeClass: 'under_threshold' }, 3500)).toBe(2850);
    expect(estimateSavingsMb({ sizeRaw: '4000MB', sizeMb: 4000, sizeClass: 'over_threshold' }, 3500)).toBeNull();
    expect(estimateSavingsMb({ sizeRaw: '?', sizeMb: null, sizeClass: 'unknown' }, 3500)).toBeNull();
  });
});

describe('inspectImageSize', () => {
  it('classifies the listed image', async () => {
    const runtime = new FakeRuntime({
      image: { repository: 'app', tag: 'test', size: '1.2GB', createdAt: '2024-05-01', id: 'sha256:1' },
    });
    const res = await inspectImageSize(runtime, image, 1000);
    expect(res.metadata.sizeClass).toBe('over_threshold');
    expect(res.image?.id).toBe('sha256:1');
    expect(res.error).toBeUndefined();
  });

  it('degrades to unknown when listing fails', async () => {
    const runtime = new FakeRuntime({ image: new Error('daemon not running') });
    const res = await inspectImageSize(runtime, image, 1000);
    expect(res).toEqual({
      metadata: { sizeRaw: 'unknown', sizeMb: null, sizeClass: 'unknown' },
      image: null,
      error: 'daemon not running',
    });
  });

  it('degrades to unknown when the image is missing', async () => {
    const runtime = new FakeRuntime({ image: null });
    const res = await inspectImageSize(runtime, image, 1000);
    expect(res.metadata.sizeClass).toBe('unknown');
    expect(res.error).toBeUndefined();
  });

  it('rethrows when the run was cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const runtime = new FakeRuntime({ image: new Error('interrupted') });
    await expect(inspectImageSize(runtime, image, 1000, controller.signal)).rejects.toThrow('interrupted');
  });
});
