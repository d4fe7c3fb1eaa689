export class StylewiseError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'StylewiseError';
  }
}

export interface InputIssue {
  field: string;
  message: string;
}

/** Empty or non-text submission. Raised before any pipeline stage runs. */
export class InvalidInputError extends StylewiseError {
  constructor(public readonly issues: InputIssue[]) {
    super(
      `Invalid input: ${issues.map((i) => `${i.field}: ${i.message}`).join('; ')}`,
      'INVALID_INPUT',
    );
    this.name = 'InvalidInputError';
  }
}

export class ProfileStoreUnavailableError extends StylewiseError {
  constructor(message: string, public readonly reason?: unknown) {
    super(message, 'PROFILE_STORE_UNAVAILABLE');
    this.name = 'ProfileStoreUnavailableError';
  }
}

export class ProfileConflictError extends StylewiseError {
  constructor(public readonly userId: string, public readonly attempts: number) {
    super(`Profile update for "${userId}" kept conflicting after ${attempts} attempts`, 'PROFILE_CONFLICT');
    this.name = 'ProfileConflictError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
