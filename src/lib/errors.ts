/**
 * Error types surfaced by the concept-graph CLI
 *
 * Every fatal condition maps to one of these so the command layer can print
 * a single red line and exit 1. Wrapped failures keep the original error as
 * `cause`.
 */

export class ConfigError extends Error {
  constructor(message: string, readonly key?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class OutputError extends Error {
  constructor(message: string, readonly path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OutputError';
  }
}

export class GraphFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GraphFormatError';
  }
}

/**
 * Render an error and its cause chain as one line
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (error.cause !== undefined) {
    return `${error.message}: ${describeError(error.cause)}`;
  }
  return error.message;
}
