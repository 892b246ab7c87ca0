import { DEFAULT_DEADLINE_MS, MIN_DEADLINE_MS } from '../config/schema.js';

export function resolveDeadlineMs(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.DOCKCHECK_DEADLINE_MS;
  if (!raw || !raw.trim()) return DEFAULT_DEADLINE_MS;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return DEFAULT_DEADLINE_MS;

  const ms = Math.floor(parsed);
  if (ms < MIN_DEADLINE_MS) return MIN_DEADLINE_MS;
  return ms;
}

export interface InstalledDeadline {
  signal: AbortSignal;
  dispose(): void;
}

export class DeadlineExceededError extends Error {
  constructor(readonly deadlineMs: number) {
    super(`Deadline of ${deadlineMs}ms exceeded`);
    this.name = 'DeadlineExceededError';
  }
}

/**
 * Abort signal that fires after `deadlineMs`. The timer is unref'd so a
 * finished run is never held open by it.
 */
export function installDeadline(deadlineMs: number): InstalledDeadline {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new DeadlineExceededError(deadlineMs)), deadlineMs);
  timer.unref();
  return {
    signal: controller.signal,
    dispose: () => clearTimeout(timer),
  };
}
