/**
 * Terminal output helpers
 */

// ANSI colors for terminal output
export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
};

export function log(message: string): void {
  console.log(message);
}

export function logSuccess(message: string): void {
  console.log(`${colors.green}✓${colors.reset} ${message}`);
}

export function logWarning(message: string): void {
  console.log(`${colors.yellow}⚠${colors.reset} ${message}`);
}

export function logInfo(message: string): void {
  console.log(`${colors.blue}ℹ${colors.reset} ${message}`);
}

export function logHeader(message: string): void {
  console.log(`\n${colors.bold}${colors.cyan}${message}${colors.reset}\n`);
}
