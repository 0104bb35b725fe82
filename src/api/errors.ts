// Errors raised by resource calls. Kept apart from AuthError: a 401 here means
// the API refused a token we did have, not that we had none.

export type ApiErrorKind = 'Unauthorized' | 'ClientError' | 'ServerError' | 'NetworkFailure';

export class ApiError extends Error {
  constructor(
    public readonly kind: ApiErrorKind,
    message: string,
    public readonly status?: number,
    public readonly body?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ApiError';
  }

  static fromResponse(method: string, url: string, status: number, body: string): ApiError {
    const kind: ApiErrorKind = status === 401 ? 'Unauthorized' : status >= 500 ? 'ServerError' : 'ClientError';
    const detail = body ? `\nResponse: ${body}` : '';
    return new ApiError(kind, `${method} ${url} failed with ${status}${detail}`, status, body);
  }
}
