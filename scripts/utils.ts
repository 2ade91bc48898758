// ANSI color codes
export const colors = {
  reset: '\x1b[0m',
  green: '\x1b[32m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  blue: '\x1b[34m'
} as const;

// Symbols
export const symbols = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ',
  search: '🔍',
  log: '📋'
} as const;

export type Color = keyof typeof colors;

export type Printer = (message: string, color?: Color) => void;

/**
 * Print colored message to console
 */
export function print(message: string, color: Color = 'reset'): void {
  console.log(`${colors[color]}${message}${colors.reset}`);
}
