/**
 * Error taxonomy for remote calls and startup configuration
 */

export class ConfigurationMissingError extends Error {
  constructor(public readonly setting: string) {
    super(`Missing required configuration: ${setting}`);
    this.name = 'ConfigurationMissingError';
  }
}

export class UpstreamStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly body: string
  ) {
    super(`Upstream responded with HTTP ${status} ${statusText}`.trim());
    this.name = 'UpstreamStatusError';
  }
}

/**
 * Network failure, timeout, or a response that could not be interpreted
 */
export class TransportError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'TransportError';
  }
}

export class InvalidConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'InvalidConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
