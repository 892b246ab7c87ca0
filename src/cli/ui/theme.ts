import chalk from 'chalk';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Centralized color definitions. Respects NO_COLOR / FORCE_COLOR via chalk.

export const theme = {
  // Structural
  bold: chalk.bold,
  dim: chalk.dim,

  // Semantic
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,

  // Symbols
  check: chalk.green('✔'),
  cross: chalk.red('✖'),
  warn: chalk.yellow('⚠'),

  // Summary box
  box: {
    border: chalk.cyan,
    title: chalk.bold.cyan,
  },
} as const;

// ── Layout Constants ────────────────────────────────────────────────────────

/** Default indent for nested content (two spaces). */
export const INDENT = '  ';

/** Width used for horizontal rules and box drawing. */
export const RULE_WIDTH = 60;

/** Label column width in key/value rows. */
export const LABEL_WIDTH = 16;
