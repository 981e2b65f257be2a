// ---------------------------------------------------------------------------
// Typed failures surfaced by the session, classifier and builders
// ---------------------------------------------------------------------------

export interface NdErrorOptions {
  /** Extra context for the CLI to print (usually a raw controller response) */
  detail?: unknown;
  cause?: unknown;
}

export class NdError extends Error {
  readonly detail?: unknown;

  constructor(message: string, options: NdErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.detail = options.detail;
  }
}

/** Missing or invalid host, credentials, verb, path or timeout. Raised before any network call. */
export class ConfigurationError extends NdError {}

/** The controller could not be reached (DNS, refused connection, timeout). */
export class TransportError extends NdError {}

/** The controller answered a login or refresh without a usable token. */
export class AuthenticationError extends NdError {}

/** ResponseHandler was given a non-conforming response, or used before it was set up. */
export class ResponseInputError extends NdError {}

/** The controller answered, but not with what the caller needed. */
export class ControllerResponseError extends NdError {}
