import type { ContainerRuntime, ImageRecord, ImageRef } from '../runtime/types.js';
import type { ArtifactMetadata, SizeClass } from './types.js';

// Units step by 1024 ("1.2GB" is 1228.8 MB) even though the runtime prints decimal units.
const UNIT_TO_MB: Partial<Record<string, number>> = {
  b: 1 / (1024 * 1024),
  kb: 1 / 1024,
  mb: 1,
  gb: 1024,
  tb: 1024 * 1024,
};

// The exponent form is what String() produces for very small values.
const SIZE_PATTERN = /^((?:\d+(?:\.\d+)?|\.\d+)(?:e[+-]?\d+)?)\s*([a-z]*)$/i;

/**
 * Parse a human-readable size ("650MB", "1.2GB", "12.5kB") into megabytes.
 * A bare number is taken as megabytes already. Returns null when unparsable.
 */
export function parseSizeMb(raw: string): number | null {
  const m = SIZE_PATTERN.exec(raw.trim());
  if (!m) return null;
  const value = Number(m[1]);
  const unit = (m[2] ?? '').toLowerCase();
  const factor = unit === '' ? 1 : UNIT_TO_MB[unit];
  if (factor === undefined || !Number.isFinite(value)) return null;
  return value * factor;
}

export function classifySize(sizeMb: number | null, thresholdMb: number): SizeClass {
  if (sizeMb === null) return 'unknown';
  return sizeMb < thresholdMb ? 'under_threshold' : 'over_threshold';
}

export function describeArtifact(sizeRaw: string, thresholdMb: number): ArtifactMetadata {
  const sizeMb = parseSizeMb(sizeRaw);
  return { sizeRaw, sizeMb, sizeClass: classifySize(sizeMb, thresholdMb) };
}

/** Estimated saving against the reference image, in MB. Null unless smaller. */
export function estimateSavingsMb(meta: ArtifactMetadata, referenceMb: number): number | null {
  if (meta.sizeMb === null || meta.sizeMb >= referenceMb) return null;
  return referenceMb - meta.sizeMb;
}

export interface SizeInspection {
  metadata: ArtifactMetadata;
  image: ImageRecord | null;
}

/**
 * Size check is advisory: listing failures degrade to an `unknown` class
 * instead of failing the run.
 */
export async function inspectImageSize(
  runtime: ContainerRuntime,
  ref: ImageRef,
  thresholdMb: number,
  signal?: AbortSignal,
): Promise<SizeInspection & { error?: string }> {
  let image: ImageRecord | null;
  try {
    image = await runtime.listImage(ref, { signal });
  } catch (err) {
    if (signal?.aborted) throw err;
    return {
      metadata: { sizeRaw: 'unknown', sizeMb: null, sizeClass: 'unknown' },
      image: null,
      error: err instanceof Error ? err.message : String(err),
    };
  }
  if (!image) {
    return { metadata: { sizeRaw: 'unknown', sizeMb: null, sizeClass: 'unknown' }, image: null };
  }
  return { metadata: describeArtifact(image.size, thresholdMb), image };
}
