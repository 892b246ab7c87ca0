export type CancelSignal = 'SIGINT' | 'SIGTERM';
export type CancelSource = 'signal' | 'keypress' | 'deadline';

export interface CancelInfo {
  signal: CancelSignal;
  source: CancelSource;
}

export interface InstalledCliCancellation {
  /** Flips on the first Ctrl+C / SIGTERM, or when the deadline passes. */
  signal: AbortSignal;
  /** Number of cancellation triggers seen. */
  count: number;
  dispose(): void;
}

let _activeCancelSignal: AbortSignal | null = null;

/**
 * Current active CLI cancellation signal (if a command installed one).
 * Used to abort interactive prompts.
 */
export function getActiveCancelSignal(): AbortSignal | null {
  return _activeCancelSignal;
}

export function installCliCancellation(opts: {
  /** Extra signal folded in, e.g. the run deadline. */
  linked?: AbortSignal;
  /** First trigger: start graceful shutdown (the abort has already happened). */
  onCancel?: (info: CancelInfo) => void | Promise<void>;
  /** Second trigger. Defaults to `process.exit(130 | 143)`. */
  onForceExit?: (info: CancelInfo & { count: number }) => void;
} = {}): InstalledCliCancellation {
  const controller = new AbortController();
  _activeCancelSignal = controller.signal;

  let count = 0;
  let disposed = false;
  let resumedStdin = false;

  const forceExit =
    opts.onForceExit ??
    ((info: CancelInfo & { count: number }) => {
      // 130 = 128 + SIGINT(2), 143 = 128 + SIGTERM(15)
      process.exit(info.signal === 'SIGTERM' ? 143 : 130);
    });

  const trigger = (info: CancelInfo) => {
    if (disposed) return;
    count += 1;

    if (count === 1) {
      controller.abort(info);
      if (opts.onCancel) {
        Promise.resolve(opts.onCancel(info)).catch(() => {
          // never throw from the signal path
        });
      }
      return;
    }

    forceExit({ ...info, count });
  };

  const onSigint = () => trigger({ signal: 'SIGINT', source: 'signal' });
  const onSigterm = () => trigger({ signal: 'SIGTERM', source: 'signal' });
  const onLinkedAbort = () => trigger({ signal: 'SIGTERM', source: 'deadline' });

  // `on`, not `once`: a second press forces exit.
  process.on('SIGINT', onSigint);
  process.on('SIGTERM', onSigterm);

  if (opts.linked) {
    if (opts.linked.aborted) onLinkedAbort();
    else opts.linked.addEventListener('abort', onLinkedAbort, { once: true });
  }

  // Raw-mode TTY input swallows SIGINT; watch for the 0x03 byte instead.
  const wantsStdin = Boolean(process.stdin.isTTY);
  const onStdinData = (chunk: Buffer | string) => {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    if (buf.includes(3)) trigger({ signal: 'SIGINT', source: 'keypress' });
  };
  if (wantsStdin) {
    process.stdin.on('data', onStdinData);
    if (process.stdin.isPaused()) {
      process.stdin.resume();
      resumedStdin = true;
    }
  }

  const dispose = () => {
    if (disposed) return;
    disposed = true;
    process.off('SIGINT', onSigint);
    process.off('SIGTERM', onSigterm);
    opts.linked?.removeEventListener('abort', onLinkedAbort);
    if (wantsStdin) {
      process.stdin.off('data', onStdinData);
      // Restore paused stdin so it does not keep the process alive.
      if (resumedStdin) process.stdin.pause();
    }
    if (_activeCancelSignal === controller.signal) _activeCancelSignal = null;
  };

  return {
    get signal() {
      return controller.signal;
    },
    get count() {
      return count;
    },
    dispose,
  };
}

export function describeCancel(reason: unknown): string {
  if (reason instanceof Error) return reason.message;
  if (isCancelInfo(reason)) {
    return reason.source === 'deadline' ? 'deadline exceeded' : `received ${reason.signal}`;
  }
  return 'cancelled';
}

function isCancelInfo(v: unknown): v is CancelInfo {
  return typeof v === 'object' && v !== null && 'signal' in v && 'source' in v;
}
