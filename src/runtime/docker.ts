import { execa } from 'execa';
import { z } from 'zod';

import type { Logger } from '../utils/logger.js';
import { CommandCancelledError, ContainerNotFoundError, RuntimeCommandError, isNotFoundOutput } from './errors.js';
import {
  formatImageRef,
  type BuildOutcome,
  type BuildRequest,
  type ContainerRuntime,
  type ImageLayer,
  type ImageRecord,
  type ImageRef,
  type ResourceSample,
  type RunSpec,
  type RuntimeCallOptions,
} from './types.js';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** stdout and stderr interleaved. */
  all: string;
  cancelled: boolean;
}

export type CommandExecutor = (
  file: string,
  args: string[],
  opts: { signal?: AbortSignal; stream?: boolean },
) => Promise<CommandResult>;

export const execaExecutor: CommandExecutor = async (file, args, opts) => {
  const res = await execa(file, args, {
    stdout: opts.stream ? ['pipe', 'inherit'] : 'pipe',
    stderr: opts.stream ? ['pipe', 'inherit'] : 'pipe',
    all: true,
    reject: false,
    ...(opts.signal ? { cancelSignal: opts.signal } : {}),
  });
  // No exit code: the process never started (ENOENT) or was killed by a signal.
  const spawnFailure = res.exitCode === undefined && res.failed ? failureText(res) : '';
  return {
    exitCode: res.exitCode ?? 1,
    stdout: asText(res.stdout),
    stderr: asText(res.stderr) || spawnFailure,
    all: asText(res.all) || spawnFailure,
    cancelled: res.isCanceled,
  };
};

function asText(v: unknown): string {
  return typeof v === 'string' ? v : '';
}

function failureText(res: object): string {
  if ('shortMessage' in res && typeof res.shortMessage === 'string') return res.shortMessage;
  if ('message' in res && typeof res.message === 'string') return res.message;
  return '';
}

const ImageRow = z.object({
  Repository: z.string(),
  Tag: z.string(),
  Size: z.string(),
  CreatedAt: z.string(),
  ID: z.string(),
});

const HistoryRow = z.object({
  Size: z.string(),
  CreatedBy: z.string(),
});

const StatsRow = z.object({
  CPUPerc: z.string(),
  MemUsage: z.string(),
});

export interface DockerRuntimeOptions {
  /** Docker-compatible binary (`docker`, `podman`). */
  bin?: string;
  exec?: CommandExecutor;
  logger?: Logger;
}

export class DockerRuntime implements ContainerRuntime {
  private readonly bin: string;
  private readonly exec: CommandExecutor;

  constructor(private readonly opts: DockerRuntimeOptions = {}) {
    this.bin = opts.bin ?? 'docker';
    this.exec = opts.exec ?? execaExecutor;
  }

  async build(req: BuildRequest, opts?: RuntimeCallOptions): Promise<BuildOutcome> {
    const args = ['build', '-t', formatImageRef(req.image)];
    if (req.dockerfile) args.push('-f', req.dockerfile);
    args.push(req.context);
    const res = await this.invoke(args, { signal: opts?.signal, stream: req.streamOutput });
    return { exitCode: res.exitCode, output: res.all };
  }

  async listImage(ref: ImageRef, opts?: RuntimeCallOptions): Promise<ImageRecord | null> {
    const res = await this.check(['images', formatImageRef(ref), '--format', '{{json .}}'], opts);
    const rows = parseJsonLines(res.stdout, ImageRow);
    const row = rows[0];
    if (!row) return null;
    return { repository: row.Repository, tag: row.Tag, size: row.Size, createdAt: row.CreatedAt, id: row.ID };
  }

  async history(ref: ImageRef, limit: number, opts?: RuntimeCallOptions): Promise<ImageLayer[]> {
    const res = await this.check(['history', formatImageRef(ref), '--format', '{{json .}}'], opts);
    return parseJsonLines(res.stdout, HistoryRow)
      .slice(0, limit)
      .map((row) => ({ size: row.Size, createdBy: row.CreatedBy }));
  }

  async stop(name: string, opts?: RuntimeCallOptions): Promise<void> {
    await this.check(['stop', name], opts, name);
  }

  async remove(name: string, opts?: RuntimeCallOptions): Promise<void> {
    await this.check(['rm', name], opts, name);
  }

  async run(spec: RunSpec, opts?: RuntimeCallOptions): Promise<string> {
    const args = ['run', '-d', '--name', spec.name, '-p', `${spec.hostPort}:${spec.containerPort}`];
    for (const [key, value] of Object.entries(spec.env)) {
      args.push('-e', `${key}=${value}`);
    }
    args.push(formatImageRef(spec.image));
    const res = await this.check(args, opts);
    return res.stdout.trim();
  }

  async logs(name: string, opts?: RuntimeCallOptions): Promise<string> {
    const res = await this.check(['logs', name], opts, name);
    return res.all;
  }

  async stats(name: string, opts?: RuntimeCallOptions): Promise<ResourceSample> {
    const res = await this.check(['stats', name, '--no-stream', '--format', '{{json .}}'], opts, name);
    const row = parseJsonLines(res.stdout, StatsRow)[0];
    if (!row) {
      throw new RuntimeCommandError(`${this.bin} stats ${name}`, res.exitCode, 'no stats row in output');
    }
    return { cpuPercent: row.CPUPerc, memoryUsage: row.MemUsage };
  }

  private async invoke(args: string[], opts: { signal?: AbortSignal; stream?: boolean }): Promise<CommandResult> {
    const command = `${this.bin} ${args[0] ?? ''}`.trim();
    this.opts.logger?.debug('runtime command', { bin: this.bin, args: redactEnvArgs(args) });
    const res = await this.exec(this.bin, args, opts);
    if (res.cancelled) throw new CommandCancelledError(command);
    this.opts.logger?.debug('runtime command finished', { command, exitCode: res.exitCode });
    return res;
  }

  /** Run a command and reject on non-zero exit. */
  private async check(args: string[], opts: RuntimeCallOptions | undefined, containerName?: string): Promise<CommandResult> {
    const res = await this.invoke(args, { signal: opts?.signal });
    if (res.exitCode === 0) return res;

    const command = `${this.bin} ${args.join(' ')}`;
    if (containerName !== undefined && isNotFoundOutput(res.stderr)) {
      throw new ContainerNotFoundError(command, res.exitCode, res.stderr, containerName);
    }
    throw new RuntimeCommandError(command, res.exitCode, res.stderr);
  }
}

function parseJsonLines<T>(stdout: string, schema: z.ZodType<T>): T[] {
  const rows: T[] = [];
  for (const line of stdout.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch {
      continue;
    }
    const parsed = schema.safeParse(raw);
    if (parsed.success) rows.push(parsed.data);
  }
  return rows;
}

// Credentials travel as `-e KEY=VALUE`; keep values out of debug logs.
function redactEnvArgs(args: string[]): string[] {
  return args.map((arg, i) => {
    if (i > 0 && args[i - 1] === '-e') {
      const eq = arg.indexOf('=');
      return eq === -1 ? arg : `${arg.slice(0, eq)}=***`;
    }
    return arg;
  });
}
