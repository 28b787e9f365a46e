export type CoveragePlannerErrorCode = 'INVALID_POLYGON' | 'INVALID_CONFIG' | 'PLANNING_FAILED'

export class CoveragePlannerError extends Error {
  readonly code: CoveragePlannerErrorCode

  constructor(code: CoveragePlannerErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

// Bad input geometry. Not retryable, the caller has to fix the polygon.
export class InvalidPolygonError extends CoveragePlannerError {
  constructor(message: string) {
    super('INVALID_POLYGON', message)
  }
}

export class InvalidConfigError extends CoveragePlannerError {
  constructor(message: string) {
    super('INVALID_CONFIG', message)
  }
}

// Every sampled angle came back empty. Callers may retry with another spacing.
export class PlanningFailedError extends CoveragePlannerError {
  constructor(message = 'Failed to compute a coverage path') {
    super('PLANNING_FAILED', message)
  }
}
