/**
 * A failure caused by the request itself. The message is returned to the
 * caller as the `reason` of the error response.
 */
export class RequestError extends Error {
  readonly status: number;

  constructor(status: number, message: string, options?: {cause?: unknown}) {
    super(message, options);
    this.name = 'RequestError';
    this.status = status;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
