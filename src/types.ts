export const VERBS = ["DELETE", "GET", "POST", "PUT"] as const;

export type Verb = (typeof VERBS)[number];

export function isVerb(value: unknown): value is Verb {
  return typeof value === "string" && (VERBS as readonly string[]).includes(value);
}

export interface PendingRequest {
  verb: Verb;
  /** Endpoint path, with or without a leading slash */
  path: string;
  /** JSON-serializable request body */
  payload?: unknown;
  /** Per-call timeout in seconds (defaults to the session timeout) */
  timeout?: number;
}

/** What the controller answered, as captured by Session.send(). */
export interface RawResponse {
  readonly returnCode: number;
  /** HTTP reason phrase; never empty */
  readonly message: string;
  /** Parsed JSON body, or { INVALID_JSON: text } */
  readonly data: unknown;
  readonly method: Verb;
  /** Absolute URL the request went to; in check mode, the unsent request's path */
  readonly requestPath: string;
  /** The body's ERROR field, when it has one */
  readonly error?: unknown;
}

export interface GetOutcome {
  found: boolean;
  success: boolean;
}

export interface ChangeOutcome {
  changed: boolean;
  success: boolean;
}

export type Outcome = GetOutcome | ChangeOutcome;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
