/**
 * Error types shared across the knowledge base and agents.
 */

/** Raised when a component cannot be constructed from the given configuration */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
