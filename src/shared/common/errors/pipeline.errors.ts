export type PipelineErrorCode =
  | 'FETCH_FAILED'
  | 'COMPLIANCE_DENIED'
  | 'EXTRACTION_FAILED'
  | 'EXPORT_UNSUPPORTED'
  | 'NOT_FOUND'
  | 'ILLEGAL_TRANSITION'
  | 'STAGE_ERROR';

/**
 * Base class for every failure the extraction pipeline reports on purpose.
 * `code` is what ends up on a failed job record and in HTTP error bodies.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(
    code: PipelineErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class FetchFailedError extends PipelineError {
  constructor(
    readonly url: string,
    message: string,
    readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super('FETCH_FAILED', message, options);
  }
}

export class ComplianceDeniedError extends PipelineError {
  constructor(reason: string) {
    super('COMPLIANCE_DENIED', reason);
  }
}

export class ExtractionFailedError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EXTRACTION_FAILED', message, options);
  }
}

export class ExportUnsupportedError extends PipelineError {
  constructor(readonly format: string) {
    super('EXPORT_UNSUPPORTED', `Unsupported export format: ${format}`);
  }
}

export class JobNotFoundError extends PipelineError {
  constructor(readonly jobId: string) {
    super('NOT_FOUND', `Job ${jobId} not found`);
  }
}

export class IllegalJobTransitionError extends PipelineError {
  constructor(jobId: string, from: string, to?: string) {
    super(
      'ILLEGAL_TRANSITION',
      to
        ? `Job ${jobId} cannot move from ${from} to ${to}`
        : `Job ${jobId} is ${from} and can no longer change`,
    );
  }
}
