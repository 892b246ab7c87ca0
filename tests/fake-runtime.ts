import { ContainerNotFoundError, RuntimeCommandError } from '../src/runtime/errors.js';
import type {
  BuildOutcome,
  BuildRequest,
  ContainerRuntime,
  ImageLayer,
  ImageRecord,
  ImageRef,
  ResourceSample,
  RunSpec,
} from '../src/runtime/types.js';

export interface FakeRuntimeOptions {
  build?: BuildOutcome | Error;
  image?: ImageRecord | null | Error;
  layers?: ImageLayer[];
  stats?: ResourceSample | Error;
  logs?: string | Error;
  /** Thrown by `run` instead of starting an instance. */
  runError?: Error;
  /** Thrown by `stop` even when the instance exists (e.g. permission denied). */
  stopError?: Error;
  /** Names of instances that already exist before the run. */
  existing?: string[];
}

export interface FakeCall {
  op: keyof ContainerRuntime;
  target: string;
}

/**
 * In-memory runtime: tracks named instances the way the daemon does.
 * `run` conflicts on a taken name; `stop`/`remove` on a missing name reject
 * with ContainerNotFoundError.
 */
export class FakeRuntime implements ContainerRuntime {
  readonly calls: FakeCall[] = [];
  readonly instances = new Map<string, RunSpec & { running: boolean }>();
  readonly builds: BuildRequest[] = [];
  private nextId = 1;

  constructor(private opts: FakeRuntimeOptions = {}) {
    for (const name of opts.existing ?? []) {
      this.instances.set(name, {
        name,
        image: { name: 'old', tag: 'latest' },
        hostPort: 8000,
        containerPort: 8000,
        env: {},
        running: true,
      });
    }
  }

  async build(req: BuildRequest): Promise<BuildOutcome> {
    this.calls.push({ op: 'build', target: ref(req.image) });
    this.builds.push(req);
    const outcome = this.opts.build ?? { exitCode: 0, output: 'Successfully built\n' };
    if (outcome instanceof Error) throw outcome;
    return outcome;
  }

  async listImage(image: ImageRef): Promise<ImageRecord | null> {
    this.calls.push({ op: 'listImage', target: ref(image) });
    const record = this.opts.image === undefined ? defaultImage(image) : this.opts.image;
    if (record instanceof Error) throw record;
    return record;
  }

  async history(image: ImageRef, limit: number): Promise<ImageLayer[]> {
    this.calls.push({ op: 'history', target: ref(image) });
    return (this.opts.layers ?? []).slice(0, limit);
  }

  async stop(name: string): Promise<void> {
    this.calls.push({ op: 'stop', target: name });
    if (this.opts.stopError) throw this.opts.stopError;
    const instance = this.instances.get(name);
    if (!instance) throw notFound('stop', name);
    instance.running = false;
  }

  async remove(name: string): Promise<void> {
    this.calls.push({ op: 'remove', target: name });
    if (!this.instances.delete(name)) throw notFound('rm', name);
  }

  async run(spec: RunSpec): Promise<string> {
    this.calls.push({ op: 'run', target: spec.name });
    if (this.opts.runError) throw this.opts.runError;
    if (this.instances.has(spec.name)) {
      throw new RuntimeCommandError(
        `docker run -d --name ${spec.name}`,
        125,
        `Conflict. The container name "/${spec.name}" is already in use`,
      );
    }
    this.instances.set(spec.name, { ...spec, running: true });
    return `f00d${String(this.nextId++).padStart(60, '0')}`;
  }

  async logs(name: string): Promise<string> {
    this.calls.push({ op: 'logs', target: name });
    const logs = this.opts.logs ?? '';
    if (logs instanceof Error) throw logs;
    return logs;
  }

  async stats(name: string): Promise<ResourceSample> {
    this.calls.push({ op: 'stats', target: name });
    const stats = this.opts.stats ?? { cpuPercent: '0.50%', memoryUsage: '120MiB / 7.6GiB' };
    if (stats instanceof Error) throw stats;
    return stats;
  }

  ops(): string[] {
    return this.calls.map((c) => c.op);
  }
}

function ref(image: ImageRef): string {
  return `${image.name}:${image.tag}`;
}

function defaultImage(image: ImageRef): ImageRecord {
  return { repository: image.name, tag: image.tag, size: '650MB', createdAt: '2024-05-01 10:00:00 +0000 UTC', id: 'sha256:abc123' };
}

function notFound(verb: string, name: string): ContainerNotFoundError {
  return new ContainerNotFoundError(`docker ${verb} ${name}`, 1, `Error response from daemon: No such container: ${name}`, name);
}
