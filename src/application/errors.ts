import type { ZodIssue } from 'zod';

/** Invalid configuration. Fatal: raised before any task starts. */
export class ConfigError extends Error {
  readonly issues: readonly ZodIssue[];

  constructor(issues: readonly ZodIssue[]) {
    super(
      `Invalid configuration: ${issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ')}`,
    );
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Identity resolution or client construction failed. Fatal. */
export class StartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StartupError';
  }
}
