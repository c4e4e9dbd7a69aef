// impactscore-backend/src/types/errors.ts

export type ScoringErrorCode =
  | "INVALID_RANGE"
  | "MALFORMED_GOAL"
  | "MISSING_TENURE"
  | "SCORE_BAND_CONFIG";

export class ScoringError extends Error {
  readonly code: ScoringErrorCode;

  constructor(code: ScoringErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Date token that matches no known range pattern, or start after end.
 */
export class InvalidRangeError extends ScoringError {
  readonly token: string;

  constructor(token: string, reason: string) {
    super("INVALID_RANGE", `Invalid date range "${token}": ${reason}`);
    this.token = token;
  }
}

export class MalformedGoalError extends ScoringError {
  readonly goalId: string;

  constructor(goalId: string, reason: string) {
    super("MALFORMED_GOAL", `Goal "${goalId}" is malformed: ${reason}`);
    this.goalId = goalId;
  }
}

export class MissingTenureError extends ScoringError {
  constructor(reason: string) {
    super("MISSING_TENURE", reason);
  }
}

/**
 * Band or volume table that cannot be used for scoring. Fatal at startup.
 */
export class ScoreBandConfigError extends ScoringError {
  constructor(reason: string) {
    super("SCORE_BAND_CONFIG", reason);
  }
}
