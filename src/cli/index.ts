import { Command, InvalidArgumentError, Option } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { ConfigError, loadConfig, parseEnvPairs, type ConfigOverrides } from '../config/loader.js';
import type { HarnessConfig } from '../config/schema.js';
import type { FatalKind } from '../core/errors.js';
import { createCliLogger, type Logger } from '../utils/logger.js';
import { describeCancel, installCliCancellation } from './cancel.js';
import { runCleanupCommand } from './commands/cleanup.js';
import { runSizeCommand } from './commands/size.js';
import { runVerifyCommand, type TeardownMode } from './commands/verify.js';
import { installDeadline } from './deadline.js';
import { EXIT } from './exit-codes.js';
import { promptConfirm } from './ui/prompts.js';
import { createRenderer, getRenderer } from './ui/renderer.js';

interface GlobalFlags {
  config?: string;
  verbose: boolean;
  quiet: boolean;
  logJson: boolean;
}

interface ConfigFlags {
  image?: string;
  tag?: string;
  context?: string;
  file?: string;
  name?: string;
  port?: number;
  maxAttempts?: number;
  intervalMs?: number;
  deadlineMs?: number;
  env: string[];
}

const FAILURE_COPY: Record<Exclude<FatalKind, 'cancelled'>, { title: string; tip: (config: HarnessConfig) => string }> = {
  build_failed: {
    title: 'Image build failed',
    tip: () => 'Re-run with --verbose to stream the full build output.',
  },
  launch_failed: {
    title: 'Container failed to start',
    tip: (c) => `Is port ${c.container.hostPort} already taken? Check \`${c.runtime} ps\`.`,
  },
  readiness_timeout: {
    title: 'Service never became healthy',
    tip: () => 'If the service starts slowly, raise --max-attempts or --interval-ms.',
  },
  unexpected: {
    title: 'Verification failed',
    tip: () => 'Try running with --verbose for more details.',
  },
};

export async function buildCli(argv: string[]): Promise<void> {
  const program = new Command();

  let globalFlags: GlobalFlags = { verbose: false, quiet: false, logJson: false };

  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('dockcheck')
    .description('Build a service image, run it, and verify it comes up healthy')
    .version(version, '-v, --version');

  program
    .option('-c, --config <path>', 'Config file (default: ./dockcheck.yaml)')
    .option('--verbose', 'Show debug output and stream build logs')
    .option('--quiet', 'Machine-friendly output (JSON lines)')
    .option('--log-json', 'Emit debug logs as JSON lines');

  program.hook('preAction', (thisCommand) => {
    const o = thisCommand.opts<{ config?: string; verbose?: boolean; quiet?: boolean; logJson?: boolean }>();
    globalFlags = { config: o.config, verbose: !!o.verbose, quiet: !!o.quiet, logJson: !!o.logJson };
    const r = createRenderer({ quiet: globalFlags.quiet });
    r.brand(version);
  });

  // ── Verify (default) ─────────────────────────────────────────────────────

  withConfigFlags(
    program
      .command('verify', { isDefault: true })
      .description('Build → size check → start → health check → resource sample → report'),
  )
    .option('--max-attempts <n>', 'Health check attempts', parsePositiveInt)
    .option('--interval-ms <ms>', 'Delay between health check attempts', parseNonNegativeInt)
    .option('--deadline-ms <ms>', 'Abort the whole run after this long', parsePositiveInt)
    .addOption(
      new Option('--teardown <mode>', 'What to do with the container afterwards')
        .choices(['keep', 'remove', 'ask'])
        .default('keep'),
    )
    .action(async (opts: ConfigFlags & { teardown: TeardownMode }) => {
      const r = getRenderer();
      const loaded = await loadConfigOrReport(globalFlags, opts);
      if (!loaded) return;
      const { config, logger } = loaded;

      const deadline = installDeadline(config.deadlineMs);
      const cancel = installCliCancellation({
        linked: deadline.signal,
        onCancel: (info) => r.warn(`Cancelling (${describeCancel(info)})…`),
      });
      const interactive = Boolean(process.stdin.isTTY && process.stderr.isTTY) && !globalFlags.quiet;

      try {
        const res = await runVerifyCommand({
          config,
          logger,
          signal: cancel.signal,
          verbose: globalFlags.verbose,
          teardown: opts.teardown,
          confirm: interactive ? (message) => promptConfirm(message) : undefined,
        });
        if (res.ok || !res.failure) return;

        process.exitCode = res.exitCode;
        const failure = res.failure;
        if (failure.kind === 'cancelled') {
          r.warn(`Cancelled: ${describeCancel(cancel.signal.reason)}. ${config.container.name} may still be running; \`dockcheck cleanup\` removes it.`);
          return;
        }
        const copy = FAILURE_COPY[failure.kind];
        r.error(copy.title, failure.message, copy.tip(config));
      } finally {
        cancel.dispose();
        deadline.dispose();
      }
    });

  // ── Maintenance ──────────────────────────────────────────────────────────

  withConfigFlags(program.command('cleanup').description('Stop and remove the configured container')).action(
    async (opts: ConfigFlags) => {
      const loaded = await loadConfigOrReport(globalFlags, opts);
      if (!loaded) return;
      const res = await runCleanupCommand({ config: loaded.config, logger: loaded.logger });
      if (!res.ok) {
        getRenderer().error('Cleanup failed', String(res.details ?? 'unknown error'));
        process.exitCode = EXIT.FAILURE;
      }
    },
  );

  withConfigFlags(program.command('size').description('Check the size of an already-built image')).action(
    async (opts: ConfigFlags) => {
      const loaded = await loadConfigOrReport(globalFlags, opts);
      if (!loaded) return;
      const res = await runSizeCommand({ config: loaded.config, logger: loaded.logger });
      if (!res.ok) {
        getRenderer().error('Size check failed', String(res.details ?? 'unknown error'));
        process.exitCode = EXIT.FAILURE;
      }
    },
  );

  await program.parseAsync(argv);
}

function withConfigFlags(cmd: Command): Command {
  return cmd
    .option('--image <name>', 'Image repository name')
    .option('--tag <tag>', 'Image tag')
    .option('--context <dir>', 'Build context directory')
    .option('-f, --file <path>', 'Dockerfile path')
    .option('--name <container>', 'Container name')
    .option('-p, --port <port>', 'Host and container port', parsePort)
    .option('-e, --env <KEY=VALUE>', 'Extra container environment (repeatable)', collectRepeatable, []);
}

async function loadConfigOrReport(
  global: GlobalFlags,
  flags: ConfigFlags,
): Promise<{ config: HarnessConfig; logger: Logger } | null> {
  const r = getRenderer();
  const logger = createCliLogger({ verbose: global.verbose, json: global.logJson });
  try {
    const { config, source } = await loadConfig({ configPath: global.config, overrides: toOverrides(flags) });
    logger.debug('configuration resolved', { source, config: { ...config, container: { ...config.container, env: Object.keys(config.container.env) } } });
    if (source) r.dim(`Using ${source}`);
    return { config, logger };
  } catch (err) {
    if (err instanceof ConfigError) {
      r.error(err.message, err.issues.length > 0 ? err.issues.join('\n') : err.message, 'See dockcheck --help for the available options.');
      process.exitCode = EXIT.INVALID_CONFIG;
      return null;
    }
    throw err;
  }
}

function toOverrides(flags: ConfigFlags): ConfigOverrides {
  const overrides: ConfigOverrides = {
    image: flags.image,
    tag: flags.tag,
    context: flags.context,
    dockerfile: flags.file,
    name: flags.name,
    port: flags.port,
    maxAttempts: flags.maxAttempts,
    intervalMs: flags.intervalMs,
    deadlineMs: flags.deadlineMs,
  };
  if (flags.env.length > 0) overrides.env = parseEnvPairs(flags.env);
  return overrides;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Must be a positive integer.');
  return n;
}

function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('Must be a non-negative integer.');
  return n;
}

function parsePort(value: string): number {
  const n = parsePositiveInt(value);
  if (n > 65_535) throw new InvalidArgumentError('Must be a valid port (1-65535).');
  return n;
}

function collectRepeatable(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function detectVersionSync(): string | null {
  try {
    const startDir = dirname(fileURLToPath(import.meta.url));

    let current = startDir;
    for (let i = 0; i < 8; i++) {
      const candidate = resolve(current, 'package.json');
      if (existsSync(candidate)) {
        const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
        if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
          return parsed.version;
        }
        return null;
      }
      const parent = resolve(current, '..');
      if (parent === current) break;
      current = parent;
    }
    return null;
  } catch {
    return null;
  }
}

buildCli(process.argv).catch((err: unknown) => {
  getRenderer().error('Unexpected error', err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exitCode = EXIT.FAILURE;
});
