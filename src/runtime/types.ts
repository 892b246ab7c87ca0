export interface ImageRef {
  name: string;
  tag: string;
}

export function formatImageRef(ref: ImageRef): string {
  return `${ref.name}:${ref.tag}`;
}

export interface BuildRequest {
  image: ImageRef;
  context: string;
  dockerfile?: string;
  /** Stream build output to the terminal as it happens. */
  streamOutput?: boolean;
}

export interface BuildOutcome {
  exitCode: number;
  output: string;
}

/** One row of `docker images`. */
export interface ImageRecord {
  repository: string;
  tag: string;
  size: string;
  createdAt: string;
  id: string;
}

/** One row of `docker history`. */
export interface ImageLayer {
  size: string;
  createdBy: string;
}

export interface RunSpec {
  name: string;
  image: ImageRef;
  hostPort: number;
  containerPort: number;
  env: Record<string, string>;
}

export interface ResourceSample {
  cpuPercent: string;
  memoryUsage: string;
}

export interface RuntimeCallOptions {
  signal?: AbortSignal;
}

/**
 * The container runtime as the harness sees it: an opaque supervisor that can
 * build images, describe them, and manage named instances.
 *
 * `stop` and `remove` reject with `ContainerNotFoundError` when no instance with
 * the given name exists. Every other non-zero exit rejects with `RuntimeCommandError`.
 */
export interface ContainerRuntime {
  build(req: BuildRequest, opts?: RuntimeCallOptions): Promise<BuildOutcome>;
  listImage(ref: ImageRef, opts?: RuntimeCallOptions): Promise<ImageRecord | null>;
  history(ref: ImageRef, limit: number, opts?: RuntimeCallOptions): Promise<ImageLayer[]>;
  stop(name: string, opts?: RuntimeCallOptions): Promise<void>;
  remove(name: string, opts?: RuntimeCallOptions): Promise<void>;
  run(spec: RunSpec, opts?: RuntimeCallOptions): Promise<string>;
  logs(name: string, opts?: RuntimeCallOptions): Promise<string>;
  stats(name: string, opts?: RuntimeCallOptions): Promise<ResourceSample>;
}
