/**
 * Every failure the client classifies extends `ClientError`. Anything else that
 * escapes a call (a `TypeError` from a bad argument, a network failure the
 * transport could not name) is left as-is and is never retried.
 */
export class ClientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Credential handshake or cookie rotation was rejected. */
export class AuthError extends ClientError {}

/** Non-200 status, or a response whose structure could not be parsed. */
export class APIError extends ClientError {}

/**
 * Generated images were announced by a candidate but never located in the
 * scanned part window. Not a subclass of `APIError`: the response itself may be fine.
 */
export class ImageGenerationError extends ClientError {}

/** The response parsed, but carried nothing usable. */
export class GeminiError extends ClientError {}

export class TimeoutError extends GeminiError {}

export class UsageLimitExceeded extends GeminiError {}

export class ModelInvalid extends GeminiError {}

export class TemporarilyBlocked extends GeminiError {}

/**
 * Service-side rejections and structural failures leave the connection in an
 * unknown state; the client drops it so the next call re-initialises.
 */
export function shouldResetConnection(error: unknown): boolean {
  return (
    error instanceof APIError ||
    error instanceof UsageLimitExceeded ||
    error instanceof ModelInvalid ||
    error instanceof TemporarilyBlocked
  );
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
