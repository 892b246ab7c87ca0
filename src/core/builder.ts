import type { BuildOutcome, ContainerRuntime, ImageRef } from '../runtime/types.js';
import { formatImageRef } from '../runtime/types.js';
import { HarnessError, toHarnessError } from './errors.js';
import type { BuildResult } from './types.js';

export interface BuildImageOptions {
  image: ImageRef;
  context: string;
  dockerfile?: string;
  streamOutput?: boolean;
  signal?: AbortSignal;
  /** Clock in milliseconds; injectable for tests. */
  now?: () => number;
}

const FAILURE_TAIL_LINES = 20;

/**
 * Build the image and time it. Throws `build_failed` on a non-zero exit;
 * nothing after the build should run in that case.
 */
export async function buildImage(runtime: ContainerRuntime, opts: BuildImageOptions): Promise<BuildResult> {
  const now = opts.now ?? Date.now;
  const startedAt = now();

  let outcome: BuildOutcome;
  try {
    outcome = await runtime.build(
      { image: opts.image, context: opts.context, dockerfile: opts.dockerfile, streamOutput: opts.streamOutput },
      { signal: opts.signal },
    );
  } catch (err) {
    throw toHarnessError(err, 'build', 'build_failed');
  }

  const durationSeconds = Math.max(0, Math.floor((now() - startedAt) / 1000));

  if (outcome.exitCode !== 0) {
    throw new HarnessError(
      'build_failed',
      'build',
      `Building ${formatImageRef(opts.image)} failed with exit code ${outcome.exitCode} after ${durationSeconds}s`,
      { output: tailLines(outcome.output, FAILURE_TAIL_LINES) },
    );
  }

  return Object.freeze({
    imageName: opts.image.name,
    tag: opts.image.tag,
    durationSeconds,
    succeeded: true,
  });
}

export function tailLines(text: string, maxLines: number): string {
  const lines = text.replace(/\n+$/, '').split('\n');
  return lines.slice(-maxLines).join('\n');
}
