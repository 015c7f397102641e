/**
 * Error taxonomy
 *
 * Every failure is contained per cycle; none of these is meant to take the
 * daemon down.
 */

/** A data provider (calendar, lunar, blurb) could not produce a value */
export class ProviderFetchError extends Error {
  readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super(`${provider}: ${message}`, options);
    this.name = "ProviderFetchError";
    this.provider = provider;
  }
}

/** Frame composition failed as a whole */
export class RenderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RenderError";
  }
}

/** The panel rejected or failed a write */
export class DisplayWriteError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DisplayWriteError";
  }
}

/** Upload rejected for auth or format reasons; retrying will not help */
export class UploadAuthError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "UploadAuthError";
    this.status = status;
  }
}

/** Network or server-side failure during upload; worth retrying */
export class UploadTransportError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "UploadTransportError";
    this.status = options?.status;
  }
}

/** Validation failure raised by the upload endpoint (4xx/5xx) */
export class ServerValidationError extends Error {
  readonly status: 400 | 401 | 405 | 500;

  constructor(status: 400 | 401 | 405 | 500, message: string) {
    super(message);
    this.name = "ServerValidationError";
    this.status = status;
  }
}
