// consensus/semantic-bft/core/errors.ts
// Error taxonomy for the semantic BFT simulator

/**
 * Only setup-time and programmer errors are thrown. Malformed, expired and
 * consensus-rejected transactions are ordinary outcomes reported through
 * verdicts, events and counters.
 */
export enum ErrorCode {
  CONFIGURATION_INVALID = 'CONFIGURATION_INVALID',
  INVALID_DIMENSION = 'INVALID_DIMENSION',
  SIMULATION_FAILED = 'SIMULATION_FAILED'
}

export abstract class SemanticBftError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly metadata?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Thrown while building a simulation, before any round runs.
 */
export class ConfigurationError extends SemanticBftError {
  constructor(message: string, issues: string[] = []) {
    super(message, ErrorCode.CONFIGURATION_INVALID, { issues });
  }

  get issues(): string[] {
    const issues = this.metadata?.issues;
    return Array.isArray(issues) ? issues.map(String) : [];
  }
}

/**
 * A vector whose length differs from the configured concept dimension.
 */
export class InvalidDimensionError extends SemanticBftError {
  constructor(public readonly expected: number, public readonly actual: number) {
    super(
      `Concept vector has ${actual} components, expected ${expected}`,
      ErrorCode.INVALID_DIMENSION,
      { expected, actual }
    );
  }
}

/**
 * An actor failed while handling a delivered message.
 */
export class SimulationError extends SemanticBftError {
  constructor(message: string, public readonly actorId: string, cause?: unknown) {
    super(message, ErrorCode.SIMULATION_FAILED, {
      actorId,
      cause: cause instanceof Error ? cause.message : String(cause)
    });
  }
}
