import { AdapterError } from '@growatt-dashboard/integrations-core';

/**
 * Errors that end the process. Everything else the collector meets is
 * logged and retried on the next cycle.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class AuthenticationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthenticationError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof AdapterError) {
    const status = error.httpStatus ? ` (HTTP ${error.httpStatus})` : '';
    return `${error.type}${status}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
