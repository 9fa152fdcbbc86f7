import chalk from 'chalk';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Centralized color definitions. Respects NO_COLOR / FORCE_COLOR via chalk.

export const theme = {
  // Structural
  bold: chalk.bold,
  dim: chalk.dim,

  // Semantic
  success: chalk.green,
  error: chalk.red,

  // Symbols
  check: chalk.green('✔'),
  warn: chalk.yellow('⚠'),
  note: chalk.blue('ℹ'),

  // Component flags in the summary
  enabled: chalk.green('yes'),
  disabled: chalk.dim('no'),

  // Box chrome
  box: {
    border: chalk.cyan,
    title: chalk.bold.cyan,
  },
} as const;

// ── Layout Constants ────────────────────────────────────────────────────────

/** Default indent for nested content (two spaces). */
export const INDENT = '  ';

/** Width used for horizontal rules and box drawing. */
export const RULE_WIDTH = 64;
