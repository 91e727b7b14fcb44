import { Verbosity, ScopedLogger } from '../interfaces/logger';

export { Verbosity };
export type { ScopedLogger };

// ANSI color codes
const colors = {
  blue: '\x1b[34m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  gray: '\x1b[90m',
  bold: '\x1b[1m',
  reset: '\x1b[0m',
};

export const red = (text: string): string =>
  `${colors.red}${text}${colors.reset}`;
export const green = (text: string): string =>
  `${colors.green}${text}${colors.reset}`;
export const yellow = (text: string): string =>
  `${colors.yellow}${text}${colors.reset}`;
export const blue = (text: string): string =>
  `${colors.blue}${text}${colors.reset}`;
export const gray = (text: string): string =>
  `${colors.gray}${text}${colors.reset}`;
export const bold = (text: string): string =>
  `${colors.bold}${text}${colors.reset}`;

// Duplicate message tracking
const recentMessages = new Set<string>();
const MAX_RECENT_MESSAGES = 10;
const DUPLICATE_TIMEOUT = 1000;

function clearOldMessages(): void {
  if (recentMessages.size > MAX_RECENT_MESSAGES) {
    recentMessages.clear();
  }
  // unref: a pending clear must not hold the process open at shutdown
  setTimeout(() => {
    recentMessages.clear();
  }, DUPLICATE_TIMEOUT).unref();
}

export function log(
  message: string,
  level: Verbosity,
  currentVerbosity: number,
  allowDuplicates: boolean = true,
): void {
  if (currentVerbosity >= level) {
    if (!allowDuplicates && recentMessages.has(message)) {
      return;
    }

    const formattedMessage = message.endsWith('\n') ? message : message + '\n';
    process.stdout.write(formattedMessage);

    if (!allowDuplicates) {
      recentMessages.add(message);
      clearOldMessages();
    }
  }
}

export function error(message: string): void {
  process.stdout.write(red(`❌ ${message}`) + '\n');
}

export function warning(message: string, currentVerbosity: number): void {
  log(yellow(`⚠️ ${message}`), Verbosity.Normal, currentVerbosity, false);
}

export function info(
  message: string,
  currentVerbosity: number,
  allowDuplicates: boolean = false,
): void {
  log(blue(`ℹ️  ${message}`), Verbosity.Normal, currentVerbosity, allowDuplicates);
}

export function success(message: string, currentVerbosity: number): void {
  log(green(`✅ ${message}`), Verbosity.Normal, currentVerbosity, true);
}

export function verbose(message: string, currentVerbosity: number): void {
  log(gray(message), Verbosity.Verbose, currentVerbosity, true);
}

export function always(message: string): void {
  const formattedMessage = message.endsWith('\n') ? message : message + '\n';
  process.stdout.write(formattedMessage);
}

/**
 * Bind the level helpers to a verbosity and a `[Tag]` prefix, so each
 * component reports under its own name (`[Photo]`, `[Keep-Alive]`, ...).
 * Info lines report one event each and are never suppressed as duplicates;
 * repeated warnings still are.
 */
export function createScopedLogger(
  tag: string,
  verbosity: number,
): ScopedLogger {
  const prefix = `[${tag}]`;
  return {
    info: (message) => info(`${prefix} ${message}`, verbosity, true),
    success: (message) => success(`${prefix} ${message}`, verbosity),
    warning: (message) => warning(`${prefix} ${message}`, verbosity),
    error: (message) => error(`${prefix} ${message}`),
    verbose: (message) => verbose(`${prefix} ${message}`, verbosity),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
