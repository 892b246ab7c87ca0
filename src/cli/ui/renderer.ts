import type { StageId } from '../../core/errors.js';
import type { HealthProbe, VerifyReport } from '../../core/types.js';
import { redactEnv } from '../../core/report.js';
import type { ImageLayer } from '../../runtime/types.js';
import { theme, INDENT, RULE_WIDTH } from './theme.js';
import { drawBox, keyValue, stageBanner, truncate } from './format.js';
import { brandLine, summaryLines } from './branding.js';
import { startSpinner, type SpinnerHandle } from './spinner.js';

// ── Renderer Interface ──────────────────────────────────────────────────────

/**
 * The Renderer is the single output coordinator for the CLI.
 * All user-facing output routes through it:
 * - InteractiveRenderer for rich TTY output (colors, spinners, box-drawing)
 * - QuietRenderer for machine-friendly JSON lines (--quiet mode)
 */
export interface Renderer {
  brand(version: string): void;

  // ── Stages ──
  stageStart(step: number, total: number, stage: StageId, label: string, detail?: string): void;
  stageDone(stage: StageId, message: string): void;
  stageWarning(stage: StageId, message: string): void;
  stageFailed(stage: StageId, message: string): void;

  // ── Readiness ──
  probe(probe: HealthProbe, maxAttempts: number): void;
  containerLogs(name: string, logs: string): void;

  // ── Errors ──
  error(title: string, details: string, tip?: string): void;
  warn(message: string): void;

  spinner(message: string): SpinnerHandle;

  // ── Completion ──
  report(report: VerifyReport, opts: { thresholdMb: number }): void;

  // ── Generic ──
  text(message: string): void;
  blank(): void;
  info(message: string): void;
  success(message: string): void;
  dim(message: string): void;
}

// ── Interactive Renderer (Rich TTY Output) ──────────────────────────────────

export class InteractiveRenderer implements Renderer {
  private writeln(msg: string = ''): void {
    process.stderr.write(msg + '\n');
  }

  brand(version: string): void {
    this.writeln(brandLine(version));
    this.writeln();
  }

  stageStart(step: number, total: number, _stage: StageId, label: string, detail?: string): void {
    this.writeln(INDENT + stageBanner(step, total, label));
    if (detail) this.writeln(`${INDENT}${theme.dim(detail)}`);
  }

  stageDone(_stage: StageId, message: string): void {
    this.writeln(`${INDENT}${theme.check} ${message}`);
    this.writeln();
  }

  stageWarning(_stage: StageId, message: string): void {
    this.writeln(`${INDENT}${theme.warn} ${theme.warning(message)}`);
  }

  stageFailed(_stage: StageId, message: string): void {
    this.writeln(`${INDENT}${theme.cross} ${theme.error(message)}`);
  }

  probe(probe: HealthProbe, maxAttempts: number): void {
    const counter = theme.dim(`[${probe.attempt}/${maxAttempts}]`);
    if (probe.matched) {
      this.writeln(`${INDENT}${counter} ${theme.success('healthy')} ${theme.dim(truncate(probe.responseBody ?? '', 80))}`);
      return;
    }
    this.writeln(`${INDENT}${counter} ${theme.dim(`not ready — ${probe.error ?? 'no status field'}`)}`);
  }

  containerLogs(name: string, logs: string): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.bold(`Container logs (${name})`)}`);
    this.writeln(INDENT + theme.dim('─'.repeat(RULE_WIDTH - 2)));
    const body = logs.replace(/\n+$/, '');
    this.writeln(body.length > 0 ? body : `${INDENT}${theme.dim('(no output)')}`);
    this.writeln(INDENT + theme.dim('─'.repeat(RULE_WIDTH - 2)));
  }

  error(title: string, details: string, tip?: string): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.error(theme.bold('ERROR'))}  ${title}`);
    this.writeln();
    for (const line of details.split('\n')) {
      this.writeln(`${INDENT}${line}`);
    }
    if (tip) {
      this.writeln();
      this.writeln(`${INDENT}${theme.dim('Tip:')} ${tip}`);
    }
    this.writeln();
  }

  warn(message: string): void {
    this.writeln(`${INDENT}${theme.warn} ${message}`);
  }

  spinner(message: string): SpinnerHandle {
    return startSpinner(message);
  }

  report(report: VerifyReport, opts: { thresholdMb: number }): void {
    this.writeln(`${INDENT}${theme.success(theme.bold('All checks passed'))}`);
    this.writeln();
    this.writeln(drawBox('Summary', summaryLines(report, opts.thresholdMb), RULE_WIDTH));

    if (report.layers.length > 0) {
      this.writeln();
      this.writeln(`${INDENT}${theme.bold('Image layers')}`);
      for (const line of layerLines(report.layers)) this.writeln(line);
    }

    this.writeln();
    this.writeln(`${INDENT}${theme.bold('Manage the container')}`);
    for (const c of report.commands) {
      this.writeln(keyValue(c.label, c.command));
    }
    this.writeln();
  }

  text(message: string): void {
    this.writeln(message);
  }

  blank(): void {
    this.writeln();
  }

  info(message: string): void {
    this.writeln(`${INDENT}${theme.info('ℹ')} ${message}`);
  }

  success(message: string): void {
    this.writeln(`${INDENT}${theme.check} ${message}`);
  }

  dim(message: string): void {
    this.writeln(`${INDENT}${theme.dim(message)}`);
  }
}

function layerLines(layers: ImageLayer[]): string[] {
  const sizeWidth = Math.max(...layers.map((l) => l.size.length), 4);
  return layers.map((l) => `${INDENT}  ${l.size.padStart(sizeWidth)}  ${theme.dim(truncate(l.createdBy, RULE_WIDTH - sizeWidth - 6))}`);
}

// ── Quiet Renderer (JSON Lines) ─────────────────────────────────────────────

export class QuietRenderer implements Renderer {
  private emit(type: string, data: Record<string, unknown> = {}): void {
    const event = { type, timestamp: new Date().toISOString(), ...data };
    process.stderr.write(JSON.stringify(event) + '\n');
  }

  brand(): void { /* no-op in quiet mode */ }

  stageStart(step: number, total: number, stage: StageId, label: string, detail?: string): void {
    this.emit('stage_start', { step, total, stage, label, detail });
  }

  stageDone(stage: StageId, message: string): void {
    this.emit('stage_done', { stage, message });
  }

  stageWarning(stage: StageId, message: string): void {
    this.emit('stage_warning', { stage, message });
  }

  stageFailed(stage: StageId, message: string): void {
    this.emit('stage_failed', { stage, message });
  }

  probe(probe: HealthProbe, maxAttempts: number): void {
    this.emit('probe', { ...probe, max_attempts: maxAttempts });
  }

  containerLogs(name: string, logs: string): void {
    this.emit('container_logs', { name, logs });
  }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, tip });
  }

  warn(message: string): void {
    this.emit('warning', { message });
  }

  spinner(message: string): SpinnerHandle {
    this.emit('spinner', { message });
    return { stop: () => {} };
  }

  report(report: VerifyReport, opts: { thresholdMb: number }): void {
    this.emit('report', {
      ...report,
      instance: { ...report.instance, env: redactEnv(report.instance.env) },
      threshold_mb: opts.thresholdMb,
    });
  }

  text(message: string): void {
    this.emit('text', { message });
  }

  blank(): void { /* no-op */ }

  info(message: string): void {
    this.emit('info', { message });
  }

  success(message: string): void {
    this.emit('success', { message });
  }

  dim(message: string): void {
    this.emit('dim', { message });
  }
}

// ── Factory ─────────────────────────────────────────────────────────────────

let _instance: Renderer | null = null;

/**
 * Get the global Renderer instance.
 * Defaults to InteractiveRenderer; use `setRenderer` to override.
 */
export function getRenderer(): Renderer {
  if (!_instance) {
    _instance = process.env.DOCKCHECK_QUIET === '1' ? new QuietRenderer() : new InteractiveRenderer();
  }
  return _instance;
}

/**
 * Override the global Renderer (e.g., for testing or --quiet mode).
 */
export function setRenderer(renderer: Renderer): void {
  _instance = renderer;
}

/**
 * Create the appropriate renderer based on flags.
 */
export function createRenderer(opts: { quiet?: boolean } = {}): Renderer {
  const r = opts.quiet ? new QuietRenderer() : new InteractiveRenderer();
  _instance = r;
  return r;
}
