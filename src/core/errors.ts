import { AbortedError } from '../utils/sleep.js';
import { CommandCancelledError } from '../runtime/errors.js';

export type StageId = 'build' | 'size' | 'launch' | 'readiness' | 'resources';

export type FatalKind = 'build_failed' | 'launch_failed' | 'readiness_timeout' | 'cancelled' | 'unexpected';

export const STAGE_LABELS: Record<StageId, string> = {
  build: 'Build image',
  size: 'Image size',
  launch: 'Start container',
  readiness: 'Health check',
  resources: 'Resource usage',
};

export interface HarnessErrorDetails {
  /** Tail of the failing command's output. */
  output?: string;
  /** Full log stream of the instance (readiness_timeout only). */
  logs?: string;
  cause?: unknown;
}

export class HarnessError extends Error {
  constructor(
    readonly kind: FatalKind,
    readonly stage: StageId,
    message: string,
    readonly details: HarnessErrorDetails = {},
  ) {
    super(message);
    this.name = 'HarnessError';
  }
}

export function isCancellation(err: unknown): boolean {
  if (err instanceof HarnessError) return err.kind === 'cancelled';
  return err instanceof AbortedError || err instanceof CommandCancelledError;
}

/**
 * Normalize anything thrown inside a stage into a `HarnessError`.
 * Cancellation wins over the stage's own failure kind.
 */
export function toHarnessError(err: unknown, stage: StageId, kind: FatalKind): HarnessError {
  if (err instanceof HarnessError) return err;
  if (isCancellation(err)) {
    return new HarnessError('cancelled', stage, `${STAGE_LABELS[stage]} cancelled`, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new HarnessError(kind, stage, message, { cause: err });
}
