import type { StageId } from '../src/core/errors.js';
import type { HealthProbe, VerifyReport } from '../src/core/types.js';
import type { Renderer } from '../src/cli/ui/renderer.js';
import type { SpinnerHandle } from '../src/cli/ui/spinner.js';

export interface RenderEvent {
  method: keyof Renderer;
  args: unknown[];
}

/** Renderer that keeps every call for assertions instead of writing anything. */
export class RecordingRenderer implements Renderer {
  readonly events: RenderEvent[] = [];

  private record(method: keyof Renderer, ...args: unknown[]): void {
    this.events.push({ method, args });
  }

  /** Arguments of every call to `method`, in order. */
  calls(method: keyof Renderer): unknown[][] {
    return this.events.filter((e) => e.method === method).map((e) => e.args);
  }

  brand(version: string): void {
    this.record('brand', version);
  }
  stageStart(step: number, total: number, stage: StageId, label: string, detail?: string): void {
    this.record('stageStart', step, total, stage, label, detail);
  }
  stageDone(stage: StageId, message: string): void {
    this.record('stageDone', stage, message);
  }
  stageWarning(stage: StageId, message: string): void {
    this.record('stageWarning', stage, message);
  }
  stageFailed(stage: StageId, message: string): void {
    this.record('stageFailed', stage, message);
  }
  probe(probe: HealthProbe, maxAttempts: number): void {
    this.record('probe', probe, maxAttempts);
  }
  containerLogs(name: string, logs: string): void {
    this.record('containerLogs', name, logs);
  }
  error(title: string, details: string, tip?: string): void {
    this.record('error', title, details, tip);
  }
  warn(message: string): void {
    this.record('warn', message);
  }
  spinner(message: string): SpinnerHandle {
    this.record('spinner', message);
    return { stop: () => {} };
  }
  report(report: VerifyReport, opts: { thresholdMb: number }): void {
    this.record('report', report, opts);
  }
  text(message: string): void {
    this.record('text', message);
  }
  blank(): void {
    this.record('blank');
  }
  info(message: string): void {
    this.record('info', message);
  }
  success(message: string): void {
    this.record('success', message);
  }
  dim(message: string): void {
    this.record('dim', message);
  }
}
