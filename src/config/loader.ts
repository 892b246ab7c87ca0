import { dirname, isAbsolute, join, resolve } from 'node:path';

import { fileExists, readYaml } from '../utils/fs.js';
import { resolveDeadlineMs } from '../cli/deadline.js';
import { HarnessConfigSchema, type HarnessConfig } from './schema.js';

export const DEFAULT_CONFIG_FILE = 'dockcheck.yaml';

/** Values coming from command-line flags; highest precedence. */
export interface ConfigOverrides {
  image?: string;
  tag?: string;
  context?: string;
  dockerfile?: string;
  name?: string;
  port?: number;
  maxAttempts?: number;
  intervalMs?: number;
  deadlineMs?: number;
  env?: Record<string, string>;
}

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

export interface LoadedConfig {
  config: HarnessConfig;
  /** Absolute path of the config file used, if any. */
  source: string | null;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Layer = Record<string, unknown>;

/**
 * Resolve configuration: defaults ← YAML file ← environment ← flags.
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const cwd = resolve(opts.cwd ?? process.cwd());
  const env = opts.env ?? process.env;

  const source = await locateConfigFile(cwd, opts.configPath ?? env.DOCKCHECK_CONFIG);
  const fileLayer = source ? await readFileLayer(source) : {};
  const merged = mergeLayers(fileLayer, envLayer(env), overrideLayer(opts.overrides ?? {}));

  const parsed = HarnessConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid configuration${source ? ` in ${source}` : ''}`, issues);
  }

  const config = parsed.data;
  config.image.context = resolve(cwd, config.image.context);
  if (config.image.dockerfile) config.image.dockerfile = resolve(cwd, config.image.dockerfile);
  return { config, source };
}

async function locateConfigFile(cwd: string, explicit: string | undefined): Promise<string | null> {
  if (explicit && explicit.trim()) {
    const path = resolve(cwd, explicit.trim());
    if (!(await fileExists(path))) throw new ConfigError(`Config file not found: ${path}`);
    return path;
  }
  const candidate = join(cwd, DEFAULT_CONFIG_FILE);
  return (await fileExists(candidate)) ? candidate : null;
}

async function readFileLayer(path: string): Promise<Layer> {
  let raw: unknown;
  try {
    raw = await readYaml(path);
  } catch (err) {
    throw new ConfigError(`Could not parse ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (raw === null || raw === undefined) return {};
  if (!isPlainObject(raw)) throw new ConfigError(`${path} must contain a mapping at the top level`);

  // Paths in the file are relative to the file, not to where the CLI runs.
  const image = raw.image;
  if (isPlainObject(image)) {
    const baseDir = dirname(path);
    const rebased: Layer = { ...image };
    for (const key of ['context', 'dockerfile'] as const) {
      const value = image[key];
      if (typeof value === 'string' && !isAbsolute(value)) rebased[key] = resolve(baseDir, value);
    }
    return { ...raw, image: rebased };
  }
  return raw;
}

function envLayer(env: NodeJS.ProcessEnv): Layer {
  const layer: Layer = {};
  const port = env.DOCKCHECK_PORT?.trim();
  if (port) {
    const n = Number(port);
    layer.container = { hostPort: n, containerPort: n };
  }
  if (env.DOCKCHECK_DEADLINE_MS?.trim()) {
    layer.deadlineMs = resolveDeadlineMs(env);
  }
  return layer;
}

function overrideLayer(o: ConfigOverrides): Layer {
  const image: Layer = {};
  if (o.image !== undefined) image.name = o.image;
  if (o.tag !== undefined) image.tag = o.tag;
  if (o.context !== undefined) image.context = o.context;
  if (o.dockerfile !== undefined) image.dockerfile = o.dockerfile;

  const container: Layer = {};
  if (o.name !== undefined) container.name = o.name;
  if (o.port !== undefined) {
    container.hostPort = o.port;
    container.containerPort = o.port;
  }
  if (o.env !== undefined) container.env = o.env;

  const health: Layer = {};
  if (o.maxAttempts !== undefined) health.maxAttempts = o.maxAttempts;
  if (o.intervalMs !== undefined) health.intervalMs = o.intervalMs;

  const layer: Layer = { image, container, health };
  if (o.deadlineMs !== undefined) layer.deadlineMs = o.deadlineMs;
  return layer;
}

/**
 * Parse repeated `--env KEY=VALUE` flags. Everything after the first `=` is the
 * value, so values may contain `=`.
 */
export function parseEnvPairs(pairs: string[]): Record<string, string> {
  const env: Record<string, string> = {};
  const issues: string[] = [];
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      issues.push(`--env: expected KEY=VALUE, got "${pair}"`);
      continue;
    }
    env[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  if (issues.length > 0) throw new ConfigError('Invalid --env value', issues);
  return env;
}

/** Deep-merge plain objects; later layers win, arrays are replaced. */
export function mergeLayers(...layers: Layer[]): Layer {
  const out: Layer = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      const existing = out[key];
      out[key] = isPlainObject(existing) && isPlainObject(value) ? mergeLayers(existing, value) : value;
    }
  }
  return out;
}

function isPlainObject(v: unknown): v is Layer {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}
