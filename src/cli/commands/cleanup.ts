import type { HarnessConfig } from '../../config/schema.js';
import { resetInstance } from '../../core/supervisor.js';
import { DockerRuntime } from '../../runtime/docker.js';
import type { ContainerRuntime } from '../../runtime/types.js';
import type { Logger } from '../../utils/logger.js';
import { getRenderer } from '../ui/renderer.js';

export interface CleanupCommandOptions {
  config: HarnessConfig;
  runtime?: ContainerRuntime;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * `dockcheck cleanup` — stop and remove the configured container. Succeeds
 * when there was nothing to remove.
 */
export async function runCleanupCommand(opts: CleanupCommandOptions): Promise<{ ok: boolean; details?: unknown }> {
  const r = getRenderer();
  const name = opts.config.container.name;
  const runtime = opts.runtime ?? new DockerRuntime({ bin: opts.config.runtime, logger: opts.logger });

  try {
    const { stopped, removed } = await resetInstance(runtime, name, { signal: opts.signal, logger: opts.logger });
    if (!stopped && !removed) {
      r.info(`No container named ${name}; nothing to do`);
    } else {
      r.success(`Stopped and removed ${name}`);
    }
    return { ok: true };
  } catch (err) {
    return { ok: false, details: err instanceof Error ? err.message : String(err) };
  }
}
