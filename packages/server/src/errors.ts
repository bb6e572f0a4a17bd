// ============================================================================
// Error taxonomy
// ============================================================================

export class InvalidCoordinateError extends Error {
  constructor(public readonly latitude: number, public readonly longitude: number) {
    super(`Invalid coordinate (${latitude}, ${longitude})`);
    this.name = 'InvalidCoordinateError';
  }
}

export class NonPositiveIntervalError extends Error {
  constructor(public readonly from: number, public readonly to: number) {
    super(`Non-positive interval: ${to} is not after ${from}`);
    this.name = 'NonPositiveIntervalError';
  }
}

export class SourceUnavailableError extends Error {
  constructor(public readonly sourceName: string, cause?: unknown) {
    super(`${sourceName} unavailable${cause instanceof Error ? `: ${cause.message}` : ''}`, { cause });
    this.name = 'SourceUnavailableError';
  }
}

export class PolicyError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid threshold policy: ${issues.join('; ')}`);
    this.name = 'PolicyError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
