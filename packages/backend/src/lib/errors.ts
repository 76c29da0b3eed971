export class ApiError extends Error {
  constructor(
    public status_code: number,
    public code: string,
    message: string,
    public details?: unknown,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ApiError';
  }
}

export class BadRequestError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(400, 'bad_request', message, details);
    this.name = 'BadRequestError';
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string) {
    super(404, 'not_found', message);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(409, 'conflict', message, details);
    this.name = 'ConflictError';
  }
}

/** A third-party API (Gmail, OpenAI, Apify) failed or answered with something unusable. */
export class UpstreamError extends ApiError {
  constructor(message: string, cause?: unknown) {
    super(502, 'upstream_error', message, undefined, { cause });
    this.name = 'UpstreamError';
  }
}

export class ServiceUnavailableError extends ApiError {
  constructor(message: string) {
    super(503, 'service_unavailable', message);
    this.name = 'ServiceUnavailableError';
  }
}
