import { theme, INDENT, LABEL_WIDTH, RULE_WIDTH } from './theme.js';

// ── Time Formatting ─────────────────────────────────────────────────────────

/**
 * Format milliseconds into a compact human-readable string.
 * Examples: "124ms", "3.2s", "1m 42s", "2h 15m"
 */
export function formatMs(ms: number): string {
  if (!Number.isFinite(ms)) return String(ms);
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) return `${totalSeconds.toFixed(1)}s`;
  const m = Math.floor(totalSeconds / 60);
  const s = Math.round(totalSeconds % 60);
  if (m < 60) return s > 0 ? `${m}m ${s}s` : `${m}m`;
  const h = Math.floor(m / 60);
  const rm = m % 60;
  return rm > 0 ? `${h}h ${rm}m` : `${h}h`;
}

/** Whole seconds as the build timer reports them: "0s", "42s", "2m 5s". */
export function formatSeconds(seconds: number): string {
  if (seconds < 60) return `${seconds}s`;
  return formatMs(seconds * 1000);
}

/** Megabytes rounded for display: "850 MB", "2.5 GB". */
export function formatMb(mb: number): string {
  if (mb >= 1024) return `${(mb / 1024).toFixed(1)} GB`;
  return `${Math.round(mb)} MB`;
}

// ── Table Alignment ─────────────────────────────────────────────────────────

/**
 * Pad a string to a fixed width (right-pad with spaces).
 */
export function padRight(str: string, width: number): string {
  if (str.length >= width) return str;
  return str + ' '.repeat(width - str.length);
}

/** Cut a single line to `max` characters with an ellipsis. */
export function truncate(str: string, max: number): string {
  const oneLine = str.replace(/\s+/g, ' ').trim();
  if (oneLine.length <= max) return oneLine;
  return oneLine.slice(0, Math.max(0, max - 1)) + '…';
}

/**
 * A stage banner:  ── [2/5] Image size ────────────────────
 */
export function stageBanner(step: number, total: number, label: string, width: number = RULE_WIDTH): string {
  const prefix = '── ';
  const counter = `[${step}/${total}] `;
  const suffixLen = Math.max(4, width - prefix.length - counter.length - label.length - 1);
  return theme.dim(prefix + counter) + theme.bold(label) + theme.dim(' ' + '─'.repeat(suffixLen));
}

// ── Box Drawing ─────────────────────────────────────────────────────────────

/**
 * Draw a box with rounded corners around content lines.
 *
 * ```
 * ╭─── Title ─────────────────────────╮
 * │                                    │
 * │  content line 1                    │
 * │                                    │
 * ╰────────────────────────────────────╯
 * ```
 */
export function drawBox(title: string, lines: string[], width: number = RULE_WIDTH): string {
  const style = theme.box.border;
  const titleStyle = theme.box.title;

  const titleText = ` ${title} `;
  const topFillLen = Math.max(0, width - 2 - 3 - titleText.length);
  const topLine = style('╭───') + titleStyle(titleText) + style('─'.repeat(topFillLen) + '╮');
  const bottomLine = style('╰' + '─'.repeat(width - 2) + '╯');
  const emptyLine = style('│') + ' '.repeat(width - 2) + style('│');

  const contentLines = lines.map((line) => {
    const padLen = Math.max(0, width - 5 - stripAnsi(line).length);
    return style('│') + '  ' + line + ' '.repeat(padLen) + style(' │');
  });

  return [topLine, emptyLine, ...contentLines, emptyLine, bottomLine].join('\n');
}

// ── Key-Value Formatting ────────────────────────────────────────────────────

/**
 * Format a label-value pair with alignment:
 * "  Build time      42s"
 */
export function keyValue(label: string, value: string, labelWidth: number = LABEL_WIDTH): string {
  return INDENT + theme.dim(padRight(label, labelWidth)) + value;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Strip ANSI escape codes from a string (for width calculations).
 */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}
