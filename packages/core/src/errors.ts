/**
 * Faults raised where bad input is supplied. Everything else (missing ids,
 * infeasible schedules, conflicts) is reported as data.
 */

export class PawPlanError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PawPlanError';
  }
}

/** Invalid construction input: non-positive duration, unknown category, malformed date */
export class ValidationError extends PawPlanError {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(`Invalid ${field}: ${message}`);
    this.name = 'ValidationError';
  }
}
