import type { ContainerRuntime, ResourceSample } from '../runtime/types.js';
import { sleep as defaultSleep, type Sleeper } from '../utils/sleep.js';

export type SampleOutcome = { ok: true; sample: ResourceSample } | { ok: false; reason: string };

/**
 * Wait out startup transients, then sample CPU and memory once. Purely
 * informational: failures come back as `{ ok: false }`, never thrown, and are
 * not retried. Cancellation during the settle delay still throws.
 */
export async function sampleResources(
  runtime: ContainerRuntime,
  name: string,
  opts: { settleDelayMs: number; signal?: AbortSignal; sleep?: Sleeper },
): Promise<SampleOutcome> {
  const sleep = opts.sleep ?? defaultSleep;
  await sleep(opts.settleDelayMs, opts.signal);
  try {
    return { ok: true, sample: await runtime.stats(name, { signal: opts.signal }) };
  } catch (err) {
    if (opts.signal?.aborted) throw err;
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}
