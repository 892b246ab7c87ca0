import { describe, expect, it } from 'vitest';

import { DockerRuntime, execaExecutor, type CommandExecutor, type CommandResult } from '../src/runtime/docker.js';
import { CommandCancelledError, ContainerNotFoundError, RuntimeCommandError } from '../src/runtime/errors.js';
import { Logger } from '../src/utils/logger.js';

interface RecordedCall {
  file: string;
  args: string[];
  stream?: boolean;
}

function recordingExecutor(respond: (args: string[]) => Partial<CommandResult> = () => ({})) {
  const calls: RecordedCall[] = [];
  const exec: CommandExecutor = async (file, args, opts) => {
    calls.push({ file, args, stream: opts.stream });
    return { exitCode: 0, stdout: '', stderr: '', all: '', cancelled: false, ...respond(args) };
  };
  return { exec, calls };
}

const image = { name: 'app', tag: 'test' };

describe('DockerRuntime', () => {
  it('builds with tag, optional dockerfile and context', async () => {
    const { exec, calls } = recordingExecutor(() => ({ exitCode: 0, all: 'Step 1/3\n' }));
    const runtime = new DockerRuntime({ exec });

    const outcome = await runtime.build({ image, context: '/ctx', dockerfile: '/ctx/Dockerfile.light', streamOutput: true });

    expect(outcome).toEqual({ exitCode: 0, output: 'Step 1/3\n' });
    expect(calls).toEqual([
      { file: 'docker', args: ['build', '-t', 'app:test', '-f', '/ctx/Dockerfile.light', '/ctx'], stream: true },
    ]);
  });

  it('returns a failed build as an outcome rather than throwing', async () => {
    const { exec } = recordingExecutor(() => ({ exitCode: 1, all: 'no such file: requirements.txt' }));
    const runtime = new DockerRuntime({ exec });
    await expect(runtime.build({ image, context: '.' })).resolves.toEqual({
      exitCode: 1,
      output: 'no such file: requirements.txt',
    });
  });

  it('runs detached with the port mapping and environment', async () => {
    const { exec, calls } = recordingExecutor(() => ({ stdout: 'abc123\n' }));
    const runtime = new DockerRuntime({ exec });

    const id = await runtime.run({ name: 'svc', image, hostPort: 8080, containerPort: 8000, env: { API_KEY: 'test-secret', PORT: '8000' } });

    expect(id).toBe('abc123');
    expect(calls[0]?.args).toEqual([
      'run', '-d', '--name', 'svc', '-p', '8080:8000', '-e', 'API_KEY=test-secret', '-e', 'PORT=8000', 'app:test',
    ]);
  });

  it('maps "no such container" to ContainerNotFoundError', async () => {
    const { exec } = recordingExecutor(() => ({ exitCode: 1, stderr: 'Error response from daemon: No such container: svc\n' }));
    const runtime = new DockerRuntime({ exec });

    const err = await runtime.stop('svc').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ContainerNotFoundError);
    if (!(err instanceof ContainerNotFoundError)) return;
    expect(err.containerName).toBe('svc');
    expect(err.command).toBe('docker stop svc');
  });

  it('keeps other failures as RuntimeCommandError', async () => {
    const { exec } = recordingExecutor(() => ({ exitCode: 1, stderr: 'permission denied\n' }));
    const runtime = new DockerRuntime({ exec });

    const err = await runtime.remove('svc').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RuntimeCommandError);
    expect(err).not.toBeInstanceOf(ContainerNotFoundError);
    expect(err).toHaveProperty('message', 'docker rm svc exited with code 1: permission denied');
  });

  it('reads the first image row and ignores non-JSON noise', async () => {
    const row = { Repository: 'app', Tag: 'test', Size: '650MB', CreatedAt: '2024-05-01 10:00:00 +0000 UTC', ID: 'abc', Extra: 1 };
    const { exec, calls } = recordingExecutor(() => ({ stdout: `WARNING: something\n${JSON.stringify(row)}\n` }));
    const runtime = new DockerRuntime({ exec });

    await expect(runtime.listImage(image)).resolves.toEqual({
      repository: 'app',
      tag: 'test',
      size: '650MB',
      createdAt: '2024-05-01 10:00:00 +0000 UTC',
      id: 'abc',
    });
    expect(calls[0]?.args).toEqual(['images', 'app:test', '--format', '{{json .}}']);
  });

  it('returns null when the image is not listed', async () => {
    const { exec } = recordingExecutor(() => ({ stdout: '' }));
    await expect(new DockerRuntime({ exec }).listImage(image)).resolves.toBeNull();
  });

  it('limits history to the requested number of layers', async () => {
    const lines = ['3MB', '10MB', '200MB'].map((Size, i) => JSON.stringify({ Size, CreatedBy: `RUN step ${i}` })).join('\n');
    const { exec } = recordingExecutor(() => ({ stdout: lines }));
    await expect(new DockerRuntime({ exec }).history(image, 2)).resolves.toEqual([
      { size: '3MB', createdBy: 'RUN step 0' },
      { size: '10MB', createdBy: 'RUN step 1' },
    ]);
  });

  it('samples stats once', async () => {
    const { exec, calls } = recordingExecutor(() => ({
      stdout: JSON.stringify({ CPUPerc: '0.25%', MemUsage: '85MiB / 7.6GiB', Name: 'svc' }),
    }));
    await expect(new DockerRuntime({ exec }).stats('svc')).resolves.toEqual({ cpuPercent: '0.25%', memoryUsage: '85MiB / 7.6GiB' });
    expect(calls[0]?.args).toEqual(['stats', 'svc', '--no-stream', '--format', '{{json .}}']);
  });

  it('fails the stats call when no row comes back', async () => {
    const { exec } = recordingExecutor(() => ({ stdout: '' }));
    await expect(new DockerRuntime({ exec }).stats('svc')).rejects.toBeInstanceOf(RuntimeCommandError);
  });

  it('surfaces cancelled commands', async () => {
    const { exec } = recordingExecutor(() => ({ exitCode: 1, cancelled: true }));
    await expect(new DockerRuntime({ exec }).logs('svc')).rejects.toBeInstanceOf(CommandCancelledError);
  });

  it('explains why a missing binary failed', async () => {
    const res = await execaExecutor('dockcheck-missing-binary', ['ps'], {});
    expect(res.exitCode).toBe(1);
    expect(res.cancelled).toBe(false);
    expect(res.stderr).toContain('ENOENT');

    const err = await new DockerRuntime({ bin: 'dockcheck-missing-binary' }).stop('svc').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RuntimeCommandError);
    expect(err).not.toBeInstanceOf(ContainerNotFoundError);
    expect(err).toHaveProperty('message', expect.stringContaining('ENOENT'));
  });

  it('uses the configured binary', async () => {
    const { exec, calls } = recordingExecutor();
    await new DockerRuntime({ exec, bin: 'podman' }).stop('svc');
    expect(calls[0]?.file).toBe('podman');
  });

  it('keeps environment values out of debug logs', async () => {
    const lines: string[] = [];
    const logger = new Logger({ level: 'debug', json: true, write: (line) => lines.push(line) });
    const { exec } = recordingExecutor(() => ({ stdout: 'abc\n' }));

    await new DockerRuntime({ exec, logger }).run({ name: 'svc', image, hostPort: 1, containerPort: 1, env: { API_KEY: 'test-secret' } });

    const first: unknown = JSON.parse(lines[0] ?? '{}');
    expect(first).toMatchObject({
      level: 'debug',
      message: 'runtime command',
      data: { bin: 'docker', args: ['run', '-d', '--name', 'svc', '-p', '1:1', '-e', 'API_KEY=***', 'app:test'] },
    });
    expect(lines.join('')).not.toContain('test-secret');
  });
});
