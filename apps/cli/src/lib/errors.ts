export class ResourceMonitorError extends Error {
  constructor(public readonly message: string, public readonly code = 'INTERNAL_ERROR', public readonly details?: unknown) {
    super(message);
    this.name = 'ResourceMonitorError';
  }
}

export class ValidationError extends ResourceMonitorError {
  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class FetchError extends ResourceMonitorError {
  constructor(message = 'Failed to fetch account resources', details?: unknown) {
    super(message, 'FETCH_FAILED', details);
    this.name = 'FetchError';
  }
}

export class SamplingCancelledError extends ResourceMonitorError {
  constructor(message = 'Sampling cancelled', details?: unknown) {
    super(message, 'CANCELLED', details);
    this.name = 'SamplingCancelledError';
  }
}

export class ReportError extends ResourceMonitorError {
  constructor(message = 'Report operation failed', details?: unknown) {
    super(message, 'REPORT_ERROR', details);
    this.name = 'ReportError';
  }
}
