/**
 * Error types shared by the provisioning and probe modules
 *
 * @license Apache-2.0
 */

export type ProvisioningErrorCode =
  | 'USAGE'
  | 'MISSING_ARTIFACT'
  | 'TOOL_FAILURE'
  | 'UNKNOWN_BACKEND';

export class ProvisioningError extends Error {
  constructor(
    public code: ProvisioningErrorCode,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ProvisioningError';
    Object.setPrototypeOf(this, ProvisioningError.prototype);
  }
}

export type ProbeErrorCode =
  | 'EMPTY_RESPONSE'
  | 'MISSING_REQUEST_ID'
  | 'MALFORMED_RESPONSE'
  | 'TRANSPORT';

export class ProbeError extends Error {
  constructor(
    public code: ProbeErrorCode,
    message: string,
    /** Raw response body, echoed by the CLI for diagnosis */
    public responseBody?: string
  ) {
    super(message);
    this.name = 'ProbeError';
    Object.setPrototypeOf(this, ProbeError.prototype);
  }
}

export class ConfigError extends Error {
  constructor(
    public variable: string,
    message: string
  ) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * A required argument is missing. Carries the usage line to print.
 */
export class UsageError extends ProvisioningError {
  constructor(public usage: string) {
    super('USAGE', `Usage: ${usage}`);
    this.name = 'UsageError';
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

export function usageError(usage: string): UsageError {
  return new UsageError(usage);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
