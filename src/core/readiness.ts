import type { ContainerRuntime } from '../runtime/types.js';
import { AbortedError, sleep as defaultSleep, throwIfAborted, type Sleeper } from '../utils/sleep.js';
import { HarnessError, isCancellation, toHarnessError } from './errors.js';
import { decodeHealthBody, HealthHttpError, type HealthFetcher } from './health.js';
import type { HealthProbe } from './types.js';

export type ReadinessOutcome =
  | { state: 'matched'; probe: HealthProbe; probes: HealthProbe[] }
  | { state: 'exhausted'; probes: HealthProbe[] };

export interface PollReadinessOptions {
  url: string;
  maxAttempts: number;
  intervalMs: number;
  fetcher: HealthFetcher;
  sleep?: Sleeper;
  signal?: AbortSignal;
  onProbe?: (probe: HealthProbe, maxAttempts: number) => void;
}

/**
 * Poll `url` until a response decodes to a health document, at most
 * `maxAttempts` times with `intervalMs` between attempts (none after the last).
 * Network and decode failures count as "no match"; only cancellation throws.
 */
export async function pollReadiness(opts: PollReadinessOptions): Promise<ReadinessOutcome> {
  if (!Number.isInteger(opts.maxAttempts) || opts.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${opts.maxAttempts}`);
  }
  const sleep = opts.sleep ?? defaultSleep;
  const probes: HealthProbe[] = [];

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    throwIfAborted(opts.signal);
    const probe = await probeOnce(opts.url, attempt, opts.fetcher, opts.signal);
    probes.push(probe);
    opts.onProbe?.(probe, opts.maxAttempts);

    if (probe.matched) return { state: 'matched', probe, probes };
    if (attempt < opts.maxAttempts) await sleep(opts.intervalMs, opts.signal);
  }

  return { state: 'exhausted', probes };
}

async function probeOnce(
  url: string,
  attempt: number,
  fetcher: HealthFetcher,
  signal: AbortSignal | undefined,
): Promise<HealthProbe> {
  let body: string;
  try {
    body = await fetcher(url, signal);
  } catch (err) {
    if (signal?.aborted) throw new AbortedError(signal.reason);
    if (err instanceof HealthHttpError) {
      return { attempt, matched: false, responseBody: err.body, error: err.message };
    }
    return { attempt, matched: false, error: describeFetchError(err) };
  }

  const decoded = decodeHealthBody(body);
  if (!decoded.ok) return { attempt, matched: false, responseBody: body, error: decoded.reason };
  return { attempt, matched: true, responseBody: body, status: decoded.status };
}

function describeFetchError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  // undici hides the interesting part (ECONNREFUSED, ...) in `cause`.
  const cause: unknown = err.cause;
  if (cause instanceof Error && cause.message) return `${err.message}: ${cause.message}`;
  return err.message;
}

export interface AwaitReadinessOptions extends PollReadinessOptions {
  instanceName: string;
}

/**
 * Poll for readiness; on exhaustion pull the instance's logs and fail with
 * `readiness_timeout` so the caller can print them.
 */
export async function awaitReadiness(runtime: ContainerRuntime, opts: AwaitReadinessOptions): Promise<HealthProbe> {
  let outcome: ReadinessOutcome;
  try {
    outcome = await pollReadiness(opts);
  } catch (err) {
    throw toHarnessError(err, 'readiness', 'readiness_timeout');
  }
  if (outcome.state === 'matched') return outcome.probe;

  let logs: string;
  try {
    logs = await runtime.logs(opts.instanceName, { signal: opts.signal });
  } catch (err) {
    if (isCancellation(err) || opts.signal?.aborted) throw toHarnessError(err, 'readiness', 'readiness_timeout');
    logs = `(logs unavailable: ${err instanceof Error ? err.message : String(err)})`;
  }

  const last = outcome.probes[outcome.probes.length - 1];
  const lastReason = last?.error ? ` (last error: ${last.error})` : '';
  throw new HarnessError(
    'readiness_timeout',
    'readiness',
    `No healthy response from ${opts.url} after ${outcome.probes.length} attempts${lastReason}`,
    { logs },
  );
}
