/** Base class for failures that map onto an HTTP status. */
export class TelemetryError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing or invalid field on an ingest record. Nothing was mutated. */
export class MalformedPayloadError extends TelemetryError {
  constructor(readonly issues: string[]) {
    super('malformed payload', 400);
  }
}

/** The session store could not be reached; no partial state was written. */
export class StorageUnavailableError extends TelemetryError {
  constructor(options?: { cause?: unknown }) {
    super('storage unavailable', 503);
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}
