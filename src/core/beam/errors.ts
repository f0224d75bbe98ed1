export type BeamErrorCode = 'INVALID_PARAMETER' | 'LOAD_OUT_OF_BOUNDS' | 'PRECONDITION_NOT_MET';

export class BeamAnalysisError extends Error {
  readonly code: BeamErrorCode;

  constructor(code: BeamErrorCode, message: string) {
    super(message);
    this.name = 'BeamAnalysisError';
    this.code = code;
  }
}

/** Beam or load parameter rejected at construction */
export class InvalidParameterError extends BeamAnalysisError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_PARAMETER', `Invalid parameter: ${issues.join('; ')}`);
    this.name = 'InvalidParameterError';
    this.issues = issues;
  }
}

export class LoadOutOfBoundsError extends BeamAnalysisError {
  readonly location: number;
  readonly length: number;

  constructor(location: number, length: number) {
    super('LOAD_OUT_OF_BOUNDS', `Load location ${location} is outside the beam [0, ${length}]`);
    this.name = 'LoadOutOfBoundsError';
    this.location = location;
    this.length = length;
  }
}

export class PreconditionNotMetError extends BeamAnalysisError {
  constructor(message: string) {
    super('PRECONDITION_NOT_MET', message);
    this.name = 'PreconditionNotMetError';
  }
}
