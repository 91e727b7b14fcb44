/**
 * Logger related types
 */

export enum Verbosity {
  Quiet = 0,
  Normal = 1,
  Verbose = 2,
}

export interface ScopedLogger {
  info: (message: string) => void;
  success: (message: string) => void;
  warning: (message: string) => void;
  error: (message: string) => void;
  verbose: (message: string) => void;
}
