/**
 * Extraction failures. Both kinds are fatal to a single extraction call;
 * no partial result accompanies them.
 */

export class GradebookError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The portal served its logged-out page; the caller has to sign in again. */
export class SessionExpiredError extends GradebookError {
  constructor() {
    super('Session expired');
  }
}

/** The page is not a gradebook page, or its payload changed shape. */
export class MalformedDocumentError extends GradebookError {
  readonly reason: string;

  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Malformed gradebook document: ${reason}`, options);
    this.reason = reason;
  }
}
