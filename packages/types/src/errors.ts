export enum AnalyticsErrorCode {
  INSUFFICIENT_HISTORY = 'INSUFFICIENT_HISTORY',
  SERIES_MISALIGNMENT = 'SERIES_MISALIGNMENT',
  INSUFFICIENT_OVERLAP = 'INSUFFICIENT_OVERLAP',
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION'
}

export class AnalyticsError extends Error {
  constructor(
    public readonly code: AnalyticsErrorCode,
    message: string,
    public readonly details: Readonly<Record<string, unknown>> = {}
  ) {
    super(message);
    this.name = 'AnalyticsError';
  }
}

export class InsufficientHistoryError extends AnalyticsError {
  constructor(
    public readonly required: number,
    public readonly available: number,
    public readonly context: string
  ) {
    super(
      AnalyticsErrorCode.INSUFFICIENT_HISTORY,
      `${context}: requires ${required} observations, ${available} available`,
      { required, available, context }
    );
    this.name = 'InsufficientHistoryError';
  }
}

export type MisalignmentReason = 'length' | 'timestamp' | 'ordering';

export class SeriesMisalignmentError extends AnalyticsError {
  constructor(
    public readonly reason: MisalignmentReason,
    public readonly index: number,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(
      AnalyticsErrorCode.SERIES_MISALIGNMENT,
      `Series misaligned (${reason}) at index ${index}: expected ${expected}, got ${actual}`,
      { reason, index, expected, actual }
    );
    this.name = 'SeriesMisalignmentError';
  }
}

export class InsufficientOverlapError extends AnalyticsError {
  constructor(
    public readonly required: number,
    public readonly available: number,
    public readonly context: string
  ) {
    super(
      AnalyticsErrorCode.INSUFFICIENT_OVERLAP,
      `${context}: requires ${required} overlapping observations, ${available} available`,
      { required, available, context }
    );
    this.name = 'InsufficientOverlapError';
  }
}

export interface ConfigurationIssue {
  path: string;
  message: string;
}

export class InvalidConfigurationError extends AnalyticsError {
  constructor(
    public readonly field: string,
    message: string,
    public readonly issues: readonly ConfigurationIssue[] = []
  ) {
    super(AnalyticsErrorCode.INVALID_CONFIGURATION, message, { field, issues });
    this.name = 'InvalidConfigurationError';
  }
}
