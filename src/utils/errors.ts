export type PipelineStage = 'load' | 'normalize' | 'filter' | 'aggregate' | 'summary' | 'export';

export class AppError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly status: number,
    readonly stage?: PipelineStage,
    readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Network failure or every encoding rejected. The run cannot continue.
 */
export class LoadError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'LOAD_ERROR', 502, 'load', details);
  }
}

export class NormalizationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'NORMALIZE_ERROR', 422, 'normalize', details);
  }
}

/**
 * The selection matched nothing. Shown to the user as an empty state, not as a failure.
 */
export class EmptyResultError extends AppError {
  constructor(stage: 'filter' | 'aggregate') {
    super('No data matches the selected filters', 'NO_MATCHING_DATA', 200, stage);
  }
}

// Raised when the summary is asked for extremes of an empty table.
export class EmptyTableError extends AppError {
  constructor() {
    super('Cannot summarize an empty table', 'EMPTY_TABLE', 500, 'summary');
  }
}

/**
 * Logged when the configured month-name locale is not available. Never thrown.
 */
export class LocaleUnavailableWarning extends Error {
  constructor(readonly requested: string, readonly fallback: string) {
    super(`Locale "${requested}" is not available; month names use "${fallback}"`);
    this.name = 'LocaleUnavailableWarning';
  }
}
