/**
 * Raised when an input batch cannot be read as customer rows at all
 * (wrong arity, missing columns, wrong field types). The whole batch is
 * discarded; nothing is returned for the rows that did parse.
 */
export class MalformedBatchError extends Error {
  constructor(
    message: string,
    public readonly details: string[] = []
  ) {
    super(message);
    this.name = 'MalformedBatchError';
  }
}

export class ServiceCodeConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ServiceCodeConfigError';
  }
}

export class PanoramaApiError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly jobId?: number
  ) {
    super(message);
    this.name = 'PanoramaApiError';
  }
}
