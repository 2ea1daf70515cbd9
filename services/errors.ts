// ─── Invalid input ──────────────────────────────────────────────────────────

export const InvalidInputCode = {
  INVALID_PROCEDURE: "INVALID_PROCEDURE",
  INVALID_POSTAL_CODE: "INVALID_POSTAL_CODE",
  INVALID_RADIUS: "INVALID_RADIUS",
  INVALID_LIMIT: "INVALID_LIMIT",
  INVALID_RANKING: "INVALID_RANKING",
  INVALID_QUESTION: "INVALID_QUESTION",
  MISSING_PROCEDURE: "MISSING_PROCEDURE",
  MISSING_POSTAL_CODE: "MISSING_POSTAL_CODE",
} as const;

export type InvalidInputCode = (typeof InvalidInputCode)[keyof typeof InvalidInputCode];

/** Request rejected before planning; terminal for the request. */
export class InvalidInputError extends Error {
  readonly code: InvalidInputCode;

  constructor(code: InvalidInputCode, message: string) {
    super(message);
    this.name = "InvalidInputError";
    this.code = code;
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }
}

// ─── Unknown location ───────────────────────────────────────────────────────

/** Well-formed postal code that is not in the geocoding dataset. */
export class UnknownLocationError extends Error {
  readonly code = "UNKNOWN_LOCATION";
  readonly postalCode: string;

  constructor(postalCode: string) {
    super(`Postal code ${postalCode} is not in the geocoding dataset`);
    this.name = "UnknownLocationError";
    this.postalCode = postalCode;
    Object.setPrototypeOf(this, UnknownLocationError.prototype);
  }
}

// ─── Collaborators ──────────────────────────────────────────────────────────

/** Inference call failed (timeout, transport, malformed reply). Never leaves the extractor. */
export class CollaboratorUnavailableError extends Error {
  readonly code = "COLLABORATOR_UNAVAILABLE";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CollaboratorUnavailableError";
    Object.setPrototypeOf(this, CollaboratorUnavailableError.prototype);
  }
}

/** Storage query failed or timed out. Retryable by the caller. */
export class StorageUnavailableError extends Error {
  readonly code = "STORAGE_UNAVAILABLE";
  readonly retryable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageUnavailableError";
    Object.setPrototypeOf(this, StorageUnavailableError.prototype);
  }
}
