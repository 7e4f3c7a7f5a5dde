/**
 * Terminal Colors
 *
 * ANSI styling for log lines. Styling is dropped when `NO_COLOR` is set or
 * stdout is not a terminal, so piped logs stay plain text.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ANSI Codes
// ═══════════════════════════════════════════════════════════════════════════════

export const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  brightGreen: '\x1b[92m',
  brightCyan: '\x1b[96m'
} as const;

export type ColorName = keyof typeof colors;

// ═══════════════════════════════════════════════════════════════════════════════
// Color Support
// ═══════════════════════════════════════════════════════════════════════════════

let override: boolean | null = null;

export function colorEnabled(): boolean {
  if (override !== null) return override;
  if (process.env['NO_COLOR']) return false;
  return process.stdout.isTTY === true;
}

/**
 * Force styling on or off; `null` returns to environment detection.
 */
export function setColorEnabled(enabled: boolean | null): void {
  override = enabled;
}

export function colorize(text: string, color: ColorName): string {
  if (!colorEnabled()) return text;
  return `${colors[color]}${text}${colors.reset}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Shorthands
// ═══════════════════════════════════════════════════════════════════════════════

export const c = {
  dim: (text: string) => colorize(text, 'dim'),
  yellow: (text: string) => colorize(text, 'yellow'),
  magenta: (text: string) => colorize(text, 'magenta'),
  cyan: (text: string) => colorize(text, 'cyan'),
  white: (text: string) => colorize(text, 'white'),
  brightGreen: (text: string) => colorize(text, 'brightGreen'),
  brightCyan: (text: string) => colorize(text, 'brightCyan'),

  success: (text: string) => colorize(text, 'brightGreen'),
  warning: (text: string) => colorize(text, 'yellow')
} as const;
