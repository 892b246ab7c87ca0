import type { HarnessConfig } from '../../config/schema.js';
import { buildImage } from '../../core/builder.js';
import { HarnessError, STAGE_LABELS, isCancellation, toHarnessError, type StageId } from '../../core/errors.js';
import { buildServiceUrl, createHttpFetcher, type HealthFetcher } from '../../core/health.js';
import { awaitReadiness } from '../../core/readiness.js';
import { buildReport } from '../../core/report.js';
import { sampleResources } from '../../core/resources.js';
import { estimateSavingsMb, inspectImageSize } from '../../core/size.js';
import { resetAndStart, resetInstance, resolveInstanceEnv } from '../../core/supervisor.js';
import type { InstanceHandle, VerifyReport } from '../../core/types.js';
import { DockerRuntime } from '../../runtime/docker.js';
import { formatImageRef, type ContainerRuntime, type ImageLayer } from '../../runtime/types.js';
import type { Logger } from '../../utils/logger.js';
import { sleep as defaultSleep, type Sleeper } from '../../utils/sleep.js';
import { EXIT, exitCodeFor, type ExitCode } from '../exit-codes.js';
import { formatMb, formatMs, formatSeconds } from '../ui/format.js';
import { getRenderer, type Renderer } from '../ui/renderer.js';

export type TeardownMode = 'keep' | 'remove' | 'ask';

export interface VerifyCommandOptions {
  config: HarnessConfig;
  runtime?: ContainerRuntime;
  fetcher?: HealthFetcher;
  sleep?: Sleeper;
  signal?: AbortSignal;
  logger?: Logger;
  /** Stream build output instead of showing a spinner. */
  verbose?: boolean;
  teardown?: TeardownMode;
  /** Source of pass-through variables; defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  /** Asked when teardown is `ask`; omit to keep the container. */
  confirm?: (message: string) => Promise<boolean>;
}

export interface VerifyCommandResult {
  ok: boolean;
  exitCode: ExitCode;
  report?: VerifyReport;
  failure?: HarnessError;
  /** Stages that started, in order. */
  stages: StageId[];
}

const TOTAL_STAGES = 5;

/**
 * `dockcheck verify` — build → size → launch → readiness → resources → report.
 * Stages run strictly in order; the first fatal failure ends the run.
 */
export async function runVerifyCommand(opts: VerifyCommandOptions): Promise<VerifyCommandResult> {
  const r = getRenderer();
  const { config, signal, logger } = opts;
  const runtime = opts.runtime ?? new DockerRuntime({ bin: config.runtime, logger });
  const fetcher = opts.fetcher ?? createHttpFetcher({ timeoutMs: config.health.requestTimeoutMs });
  const sleep = opts.sleep ?? defaultSleep;
  const image = { name: config.image.name, tag: config.image.tag };
  const ref = formatImageRef(image);
  const stages: StageId[] = [];

  const begin = (stage: StageId, detail?: string) => {
    stages.push(stage);
    r.stageStart(stages.length, TOTAL_STAGES, stage, STAGE_LABELS[stage], detail);
  };

  try {
    // ── 1. Build ────────────────────────────────────────────────────────────
    begin('build', `${config.runtime} build -t ${ref} ${config.image.context}`);
    const build = await withProgress(r, !opts.verbose, `Building ${ref} (usually 1–2 minutes)…`, () =>
      buildImage(runtime, {
        image,
        context: config.image.context,
        dockerfile: config.image.dockerfile,
        streamOutput: opts.verbose,
        signal,
      }),
    );
    r.stageDone('build', `Built ${ref} in ${formatSeconds(build.durationSeconds)}`);

    // ── 2. Size ─────────────────────────────────────────────────────────────
    begin('size', `target: under ${config.size.thresholdMb} MB`);
    const inspection = await inspectImageSize(runtime, image, config.size.thresholdMb, signal).catch((err: unknown) => {
      throw toHarnessError(err, 'size', 'cancelled');
    });
    if (inspection.error) r.stageWarning('size', `Could not read image metadata: ${inspection.error}`);
    reportSize(r, inspection.metadata, config);

    // ── 3. Launch ───────────────────────────────────────────────────────────
    const instance: InstanceHandle = {
      name: config.container.name,
      image,
      hostPort: config.container.hostPort,
      containerPort: config.container.containerPort,
      env: resolveInstanceEnv({
        env: config.container.env,
        passEnv: config.container.passEnv,
        containerPort: config.container.containerPort,
        source: opts.env,
      }),
    };
    begin('launch', `${instance.name}  ${config.health.host}:${instance.hostPort} → ${instance.containerPort}`);
    const containerId = await withProgress(r, true, `Replacing any existing ${instance.name} and starting a new one…`, () =>
      resetAndStart(runtime, instance, { signal, logger }),
    );
    r.stageDone('launch', `Container ${instance.name} started ${shortId(containerId)}`);

    // ── 4. Readiness ────────────────────────────────────────────────────────
    const healthUrl = buildServiceUrl(config.health.host, instance.hostPort, config.health.path);
    begin(
      'readiness',
      `GET ${healthUrl} — up to ${config.health.maxAttempts} attempts, ${formatMs(config.health.intervalMs)} apart`,
    );
    if (config.health.startupDelayMs > 0) {
      r.dim(`Giving the service ${formatMs(config.health.startupDelayMs)} to start…`);
      await sleep(config.health.startupDelayMs, signal).catch((err: unknown) => {
        throw toHarnessError(err, 'readiness', 'cancelled');
      });
    }
    const health = await awaitReadiness(runtime, {
      url: healthUrl,
      maxAttempts: config.health.maxAttempts,
      intervalMs: config.health.intervalMs,
      fetcher,
      sleep,
      signal,
      instanceName: instance.name,
      onProbe: (probe, max) => r.probe(probe, max),
    });
    r.stageDone('readiness', `Service is healthy (status=${health.status ?? '?'})`);

    // ── 5. Resources ────────────────────────────────────────────────────────
    begin('resources', `sampling once after ${formatMs(config.resources.settleDelayMs)}`);
    const sampled = await sampleResources(runtime, instance.name, {
      settleDelayMs: config.resources.settleDelayMs,
      signal,
      sleep,
    }).catch((err: unknown) => {
      throw toHarnessError(err, 'resources', 'cancelled');
    });
    if (sampled.ok) {
      r.stageDone('resources', `CPU ${sampled.sample.cpuPercent}  ·  memory ${sampled.sample.memoryUsage}`);
    } else {
      r.stageWarning('resources', `Resource sample unavailable: ${sampled.reason}`);
      r.blank();
    }

    // ── Report ──────────────────────────────────────────────────────────────
    const layers = await readLayers(runtime, opts, image);
    const report = buildReport({
      build,
      artifact: inspection.metadata,
      image: inspection.image,
      layers,
      instance,
      containerId,
      host: config.health.host,
      docsPath: config.health.docsPath,
      health,
      resources: sampled.ok ? sampled.sample : null,
      runtimeBin: config.runtime,
    });
    r.report(report, { thresholdMb: config.size.thresholdMb });

    await teardown(r, runtime, instance.name, opts);
    return { ok: true, exitCode: EXIT.SUCCESS, report, stages };
  } catch (err) {
    const stage = stages[stages.length - 1] ?? 'build';
    const failure = toHarnessError(err, stage, 'unexpected');
    r.stageFailed(failure.stage, `${STAGE_LABELS[failure.stage]} ${failure.kind === 'cancelled' ? 'cancelled' : 'failed'}`);
    if (failure.details.output) r.text(failure.details.output);
    if (failure.details.logs !== undefined) r.containerLogs(config.container.name, failure.details.logs);
    return { ok: false, exitCode: exitCodeFor(failure.kind), failure, stages };
  }
}

async function withProgress<T>(r: Renderer, enabled: boolean, text: string, fn: () => Promise<T>): Promise<T> {
  if (!enabled) {
    r.dim(text);
    return await fn();
  }
  const spinner = r.spinner(text);
  try {
    return await fn();
  } finally {
    spinner.stop();
  }
}

function reportSize(r: Renderer, meta: VerifyReport['artifact'], config: HarnessConfig): void {
  const threshold = config.size.thresholdMb;
  switch (meta.sizeClass) {
    case 'under_threshold': {
      const savings = estimateSavingsMb(meta, config.size.referenceMb);
      const note = savings === null ? '' : ` (~${formatMb(savings)} smaller than the ${formatMb(config.size.referenceMb)} reference)`;
      r.stageDone('size', `Image size ${meta.sizeRaw} is under ${threshold} MB${note}`);
      return;
    }
    case 'over_threshold':
      r.stageWarning('size', `Image size ${meta.sizeRaw} is larger than the ${threshold} MB target`);
      r.blank();
      return;
    case 'unknown':
      r.stageWarning('size', `Could not interpret image size "${meta.sizeRaw}"; skipping the size check`);
      r.blank();
      return;
  }
}

async function readLayers(
  runtime: ContainerRuntime,
  opts: VerifyCommandOptions,
  image: { name: string; tag: string },
): Promise<ImageLayer[]> {
  const limit = opts.config.report.historyLimit;
  if (limit === 0) return [];
  try {
    return await runtime.history(image, limit, { signal: opts.signal });
  } catch (err) {
    if (isCancellation(err) || opts.signal?.aborted) throw toHarnessError(err, 'resources', 'cancelled');
    opts.logger?.debug('image history unavailable', { error: err instanceof Error ? err.message : String(err) });
    return [];
  }
}

async function teardown(r: Renderer, runtime: ContainerRuntime, name: string, opts: VerifyCommandOptions): Promise<void> {
  const mode = opts.teardown ?? 'keep';
  if (mode === 'keep') return;

  if (mode === 'ask') {
    if (!opts.confirm) {
      r.dim(`Leaving ${name} running (no interactive terminal to ask).`);
      return;
    }
    let remove: boolean;
    try {
      remove = await opts.confirm(`Stop and remove ${name} now?`);
    } catch (err) {
      // Ctrl+C at the prompt means "leave it".
      opts.logger?.debug('teardown prompt aborted', { error: err instanceof Error ? err.message : String(err) });
      remove = false;
    }
    if (!remove) return;
  }

  try {
    await resetInstance(runtime, name);
    r.success(`Stopped and removed ${name}`);
  } catch (err) {
    r.warn(`Could not remove ${name}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function shortId(id: string): string {
  return id ? `(${id.slice(0, 12)})` : '';
}
