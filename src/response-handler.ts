import { ResponseInputError } from "./errors.js";
import { silentSink, type DiagnosticSink } from "./logger.js";
import {
  VERBS,
  isRecord,
  isVerb,
  type ChangeOutcome,
  type GetOutcome,
  type Outcome,
  type RawResponse,
  type Verb,
} from "./types.js";

/** Return codes a GET may carry and still count as answered */
const GET_RETURN_CODES = new Set([200, 404]);

/** Anything but null/undefined/false/""/[]/{} counts as an error payload. */
export function hasError(value: unknown): boolean {
  if (value === undefined || value === null || value === false) return false;
  if (typeof value === "string") return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return true;
}

export function classifyResponse(verb: "GET", response: RawResponse): GetOutcome;
export function classifyResponse(verb: Exclude<Verb, "GET">, response: RawResponse): ChangeOutcome;
export function classifyResponse(verb: Verb, response: RawResponse): Outcome;
export function classifyResponse(verb: Verb, response: RawResponse): Outcome {
  const { returnCode, message } = response;

  if (verb === "GET") {
    // A missing resource is a successful query with nothing to show for it.
    if (returnCode === 404 && message === "Not Found") {
      return { found: false, success: true };
    }
    if (!GET_RETURN_CODES.has(returnCode) || message !== "OK") {
      return { found: false, success: false };
    }
    return { found: true, success: true };
  }

  // Some controller releases answer 200 with an embedded error object.
  if (hasError(response.error)) {
    return { changed: false, success: false };
  }
  if (message !== "OK") {
    return { changed: false, success: false };
  }
  return { changed: true, success: true };
}

function assertRawResponse(value: unknown): asserts value is RawResponse {
  if (!isRecord(value)) {
    throw new ResponseInputError(`response must be an object, got ${JSON.stringify(value)}`);
  }
  if (typeof value.message !== "string" || value.message === "") {
    throw new ResponseInputError("response must have a non-empty message", { detail: value });
  }
  if (typeof value.returnCode !== "number" || !Number.isInteger(value.returnCode)) {
    throw new ResponseInputError("response must have an integer returnCode", { detail: value });
  }
}

/**
 * Turns one controller response into a verb-aware outcome.
 *
 * ```ts
 * const handler = new ResponseHandler();
 * handler.verb = "GET";
 * handler.response = await session.send({ verb: "GET", path });
 * handler.commit();
 * handler.result; // { found, success }
 * ```
 */
export class ResponseHandler {
  private _verb: Verb | undefined;
  private _response: RawResponse | undefined;
  private _result: Outcome | undefined;

  constructor(private readonly sink: DiagnosticSink = silentSink) {}

  get verb(): Verb | undefined {
    return this._verb;
  }

  set verb(value: unknown) {
    if (!isVerb(value)) {
      throw new ResponseInputError(`verb must be one of ${VERBS.join(", ")}. Got ${String(value)}.`);
    }
    this._verb = value;
    this._result = undefined;
  }

  get response(): RawResponse | undefined {
    return this._response;
  }

  set response(value: unknown) {
    assertRawResponse(value);
    this._response = value;
    this._result = undefined;
  }

  get result(): Outcome {
    if (!this._result) {
      throw new ResponseInputError("ResponseHandler.commit() must be called before reading result");
    }
    return { ...this._result };
  }

  commit(): void {
    if (!this._response) {
      throw new ResponseInputError("ResponseHandler.response must be set prior to calling commit()");
    }
    if (!this._verb) {
      throw new ResponseInputError("ResponseHandler.verb must be set prior to calling commit()");
    }
    this._result = classifyResponse(this._verb, this._response);
    this.sink.log(
      "debug",
      `ResponseHandler.commit: ${this._verb} ${this._response.returnCode} ${this._response.message} -> ${JSON.stringify(this._result)}`,
    );
  }
}
