export class InsufficientDataError extends Error {
  code: 'INSUFFICIENT_DATA';

  constructor(message = 'at least one WER value is required to compute statistics') {
    super(message);
    this.name = 'InsufficientDataError';
    this.code = 'INSUFFICIENT_DATA';
  }
}

export class InvalidScoreError extends Error {
  code: 'INVALID_SCORE';

  constructor(
    message: string,
    readonly index: number
  ) {
    super(message);
    this.name = 'InvalidScoreError';
    this.code = 'INVALID_SCORE';
  }
}
