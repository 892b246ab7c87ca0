import ora from 'ora';

// ── TTY-Aware Spinner ───────────────────────────────────────────────────────
// Wraps `ora`. Falls back to a static line in non-TTY contexts (CI, piped
// output). Writes to stderr to keep stdout clean.

export interface SpinnerHandle {
  stop(): void;
}

/**
 * Create and start a spinner with the given text.
 * In non-TTY environments, prints a static line instead.
 */
export function startSpinner(text: string): SpinnerHandle {
  const stream = process.stderr;

  // `ora` disables itself under CI=1 even on a local TTY; decide here instead.
  if (!stream.isTTY) {
    stream.write(`  ${text}\n`);
    return { stop: () => {} };
  }

  const spinner = ora({
    text,
    stream,
    spinner: 'dots',
    indent: 2,
    isEnabled: true,
  }).start();

  return {
    stop() {
      spinner.stop();
    },
  };
}
