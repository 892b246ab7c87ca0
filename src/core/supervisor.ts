import { ContainerNotFoundError } from '../runtime/errors.js';
import type { ContainerRuntime } from '../runtime/types.js';
import type { Logger } from '../utils/logger.js';
import { toHarnessError } from './errors.js';
import type { InstanceHandle } from './types.js';

export interface SupervisorOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Stop and remove any instance with this name. Absence is the desired end state,
 * so "no such container" is ignored; any other failure propagates.
 */
export async function resetInstance(
  runtime: ContainerRuntime,
  name: string,
  opts: SupervisorOptions = {},
): Promise<{ stopped: boolean; removed: boolean }> {
  const stopped = await ignoreNotFound(() => runtime.stop(name, { signal: opts.signal }));
  const removed = await ignoreNotFound(() => runtime.remove(name, { signal: opts.signal }));
  opts.logger?.debug('instance reset', { name, stopped, removed });
  return { stopped, removed };
}

/**
 * Reset the named instance, then start a fresh detached one.
 * Returns the new container id. Any failure is `launch_failed`.
 */
export async function resetAndStart(
  runtime: ContainerRuntime,
  handle: InstanceHandle,
  opts: SupervisorOptions = {},
): Promise<string> {
  try {
    await resetInstance(runtime, handle.name, opts);
    return await runtime.run(
      {
        name: handle.name,
        image: handle.image,
        hostPort: handle.hostPort,
        containerPort: handle.containerPort,
        env: handle.env,
      },
      { signal: opts.signal },
    );
  } catch (err) {
    throw toHarnessError(err, 'launch', 'launch_failed');
  }
}

/**
 * Environment injected into the instance: explicit values, then pass-through
 * variables copied unchanged from the invoking environment (absent → empty),
 * then PORT so the service binds where it is mapped.
 */
export function resolveInstanceEnv(opts: {
  env: Record<string, string>;
  passEnv: string[];
  containerPort: number;
  source?: NodeJS.ProcessEnv;
}): Record<string, string> {
  const source = opts.source ?? process.env;
  const env: Record<string, string> = { ...opts.env };
  for (const key of opts.passEnv) {
    env[key] = source[key] ?? '';
  }
  env.PORT = String(opts.containerPort);
  return env;
}

async function ignoreNotFound(fn: () => Promise<void>): Promise<boolean> {
  try {
    await fn();
    return true;
  } catch (err) {
    if (err instanceof ContainerNotFoundError) return false;
    throw err;
  }
}
