import { STATUS_CODES } from "node:http";
import { isIPv6 } from "node:net";
import { AuthenticationError, ConfigurationError, TransportError } from "./errors.js";
import { RingBuffer } from "./history.js";
import { silentSink, type DiagnosticSink } from "./logger.js";
import { isRecord, isVerb, type PendingRequest, type RawResponse } from "./types.js";

export interface SessionConfig {
  /** Controller IPv4 address (preferred when both are set) */
  ip4?: string;
  /** Controller IPv6 address */
  ip6?: string;
  username?: string;
  password?: string;
  domain?: string;
  /** Default per-call timeout in seconds */
  timeout?: number;
}

export interface SessionOptions {
  sink?: DiagnosticSink;
  /** Source of the ND_* defaults (process.env unless given) */
  env?: Record<string, string | undefined>;
}

export interface HistoryEntry {
  returnCode: number;
  path: string;
}

/** What RestSend needs from a session; tests substitute their own. */
export interface Sender {
  send(request: PendingRequest): Promise<RawResponse>;
  refreshLogin(): Promise<void>;
}

export const DEFAULT_TIMEOUT = 30;
export const HISTORY_CAPACITY = 50;
export const SESSION_COOKIE = "AuthCookie";

const CREDENTIAL_KEYS = ["ip4", "ip6", "username", "password", "domain"] as const;
const SESSION_COOKIE_PATTERN = new RegExp(`(?:^|[;,]\\s*)${SESSION_COOKIE}=([^;,]*)`);

type Settings = Required<SessionConfig>;

function validateTimeout(value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`timeout must be a positive integer number of seconds. Got ${String(value)}.`);
  }
  return value;
}

/** Leading slashes stripped, then exactly one put back. */
export function normalizePath(path: string): string {
  return `/${path.replace(/^\/+/, "")}`;
}

/** Copy of a payload that is safe to log. */
function maskPayload(payload: unknown): unknown {
  if (!isRecord(payload) || !("userPasswd" in payload)) return payload;
  return { ...payload, userPasswd: "********" };
}

function parseBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return { INVALID_JSON: text };
  }
}

function describeTransportFailure(err: unknown, timeout: number): string {
  if (err instanceof Error) {
    if (err.name === "TimeoutError" || err.name === "AbortError") {
      return `request timed out after ${timeout}s`;
    }
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : "";
    return `${err.message}${cause}`;
  }
  return String(err);
}

/**
 * Authenticated connection to one controller.
 *
 * Holds the credentials, the current token and a diagnostic trail of the
 * last {@link HISTORY_CAPACITY} calls. Calls on one instance must not overlap:
 * token updates and history pushes are not guarded.
 *
 * Credentials default to the ND_IP4, ND_IP6, ND_USERNAME, ND_PASSWORD and
 * ND_DOMAIN environment variables; explicit config wins.
 *
 * ```ts
 * const session = new Session({ ip4: "192.0.2.10", password: "test-secret" });
 * await session.login();
 * const response = await session.send({ verb: "GET", path: "/appcenter/..." });
 * ```
 */
export class Session implements Sender {
  private settings: Settings;
  private readonly sink: DiagnosticSink;
  private readonly _history = new RingBuffer<HistoryEntry>(HISTORY_CAPACITY);
  private _authenticated = false;
  private _token = "";
  private _rbac: Record<string, unknown> = {};
  private _lastStatusCode = -1;
  private _lastUrl = "";

  constructor(config: SessionConfig = {}, options: SessionOptions = {}) {
    const env = options.env ?? process.env;
    this.sink = options.sink ?? silentSink;
    this.settings = {
      ip4: config.ip4 ?? env.ND_IP4 ?? "",
      ip6: config.ip6 ?? env.ND_IP6 ?? "",
      username: config.username ?? env.ND_USERNAME ?? "admin",
      password: config.password ?? env.ND_PASSWORD ?? "",
      domain: config.domain ?? env.ND_DOMAIN ?? "local",
      timeout: validateTimeout(config.timeout ?? DEFAULT_TIMEOUT),
    };
  }

  // ── state ─────────────────────────────────────────────────────────

  get authenticated(): boolean {
    return this._authenticated;
  }

  get token(): string {
    return this._token;
  }

  get rbac(): Record<string, unknown> {
    return { ...this._rbac };
  }

  get lastStatusCode(): number {
    return this._lastStatusCode;
  }

  get lastUrl(): string {
    return this._lastUrl;
  }

  /** Most recent call first */
  get history(): HistoryEntry[] {
    return this._history.toArray();
  }

  /** Address requests go to: ip4 when set, else ip6 */
  get host(): string {
    return this.settings.ip4 || this.settings.ip6;
  }

  get username(): string {
    return this.settings.username;
  }

  get domain(): string {
    return this.settings.domain;
  }

  get timeout(): number {
    return this.settings.timeout;
  }

  // ── configuration ─────────────────────────────────────────────────

  /**
   * Override settings. Changing the host or any credential on an
   * authenticated session drops the token; call login() again.
   */
  configure(config: SessionConfig): void {
    const timeout = config.timeout === undefined ? this.settings.timeout : validateTimeout(config.timeout);
    const changed = CREDENTIAL_KEYS.some(
      (key) => config[key] !== undefined && config[key] !== this.settings[key],
    );
    this.settings = {
      ip4: config.ip4 ?? this.settings.ip4,
      ip6: config.ip6 ?? this.settings.ip6,
      username: config.username ?? this.settings.username,
      password: config.password ?? this.settings.password,
      domain: config.domain ?? this.settings.domain,
      timeout,
    };
    if (changed && this._authenticated) {
      this.sink.log("info", "Session.configure: credentials changed, discarding token");
      this._authenticated = false;
      this._token = "";
      this._rbac = {};
    }
  }

  // ── login ─────────────────────────────────────────────────────────

  /** No-op once authenticated. */
  async login(): Promise<void> {
    if (this._authenticated) return;
    this.requireCredentials("login");
    await this.authenticate("login", "/login", { "Content-Type": "application/json" });
  }

  /**
   * Re-authenticate with the stored credentials, e.g. after the controller
   * expired the token. Runs whether or not the session is authenticated.
   */
  async refreshLogin(): Promise<void> {
    this.requireCredentials("refreshLogin");
    await this.authenticate("refreshLogin", "/refresh", {
      "Content-Type": "application/json",
      Cookie: `${SESSION_COOKIE}=${this._token}`,
      Authorization: this._token,
    });
  }

  private requireCredentials(caller: string): void {
    for (const key of ["username", "password", "domain"] as const) {
      if (!this.settings[key]) {
        throw new ConfigurationError(`Session.${caller}: ${key} must be set before calling Session.${caller}()`);
      }
    }
  }

  private async authenticate(caller: string, path: string, headers: Record<string, string>): Promise<void> {
    const previous = this._token;
    const request: PendingRequest = {
      verb: "POST",
      path,
      payload: {
        userName: this.settings.username,
        userPasswd: this.settings.password,
        domain: this.settings.domain,
      },
    };
    try {
      const response = await this.dispatch(request, headers);
      this.acceptToken(caller, response);
    } catch (err) {
      this._token = previous;
      throw err;
    }
  }

  private acceptToken(caller: string, response: RawResponse): void {
    if (response.returnCode < 200 || response.returnCode >= 300) {
      throw new AuthenticationError(
        `Session.${caller}: controller rejected the request with ${response.returnCode} ${response.message}`,
        { detail: response },
      );
    }
    const data = response.data;
    const token = isRecord(data) ? [data.jwttoken, data.token].find((t) => typeof t === "string" && t) : undefined;
    if (typeof token !== "string" || !isRecord(data)) {
      throw new AuthenticationError(`Session.${caller}: unable to parse token from response`, { detail: response });
    }
    this._token = token;
    this._rbac = isRecord(data.rbac) ? data.rbac : {};
    this._authenticated = true;
    this.sink.log("debug", `Session.${caller}: authenticated as ${this.settings.username}`);
  }

  // ── requests ──────────────────────────────────────────────────────

  /**
   * Send one request and capture the controller's answer. Any status code
   * is a valid answer; only an unreachable controller fails.
   */
  async send(request: PendingRequest): Promise<RawResponse> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this._token) {
      headers.Authorization = this._token;
      headers[SESSION_COOKIE] = this._token;
      headers.Cookie = `${SESSION_COOKIE}=${this._token}`;
    }
    return this.dispatch(request, headers);
  }

  buildUrl(path: string): string {
    const host = this.host;
    if (!host) {
      throw new ConfigurationError("ip4 or ip6 must be set before sending a request");
    }
    const bracketed = isIPv6(host) ? `[${host}]` : host;
    return `https://${bracketed}${normalizePath(path)}`;
  }

  private async dispatch(request: PendingRequest, headers: Record<string, string>): Promise<RawResponse> {
    if (!request.path) {
      throw new ConfigurationError("path must be set before sending a request");
    }
    if (!isVerb(request.verb)) {
      throw new ConfigurationError(`verb must be one of DELETE, GET, POST, PUT. Got ${String(request.verb)}.`);
    }
    if (request.verb === "GET" && request.payload !== undefined) {
      throw new ConfigurationError("a GET request cannot carry a payload");
    }
    const url = this.buildUrl(request.path);
    const timeout = request.timeout === undefined ? this.settings.timeout : validateTimeout(request.timeout);

    let message = `Session.send: ${request.verb} ${url}`;
    if (request.payload !== undefined) {
      message += `, payload: ${JSON.stringify(maskPayload(request.payload))}`;
    }
    this.sink.log("debug", message);

    let resp: Response;
    let text: string;
    try {
      resp = await fetch(url, {
        method: request.verb,
        headers,
        body: request.payload === undefined ? undefined : JSON.stringify(request.payload),
        signal: AbortSignal.timeout(timeout * 1000),
      });
      text = await resp.text();
    } catch (err) {
      const reason = describeTransportFailure(err, timeout);
      this.sink.log("error", `Session.send: ${request.verb} ${url} failed: ${reason}`);
      throw new TransportError(`Error connecting to the controller at ${url}: ${reason}`, { cause: err });
    }

    const data = parseBody(text);
    const response: RawResponse = Object.freeze({
      returnCode: resp.status,
      message: resp.statusText || STATUS_CODES[resp.status] || "Unknown",
      data,
      method: request.verb,
      requestPath: url,
      ...(isRecord(data) && data.ERROR !== undefined ? { error: data.ERROR } : {}),
    });

    this._lastStatusCode = response.returnCode;
    this._lastUrl = url;
    this._history.push({ returnCode: response.returnCode, path: normalizePath(request.path) });

    // Renewal only applies to a session that holds a token; login and
    // refresh take theirs from the body.
    const cookie = resp.headers.get("set-cookie");
    const renewed = cookie ? SESSION_COOKIE_PATTERN.exec(cookie)?.[1] : undefined;
    if (renewed && this._authenticated) {
      this._token = renewed;
      this.sink.log("debug", "Session.send: controller renewed the session cookie");
    }

    return response;
  }

  /** Dump the call history to the sink at debug level. */
  logHistory(): void {
    this.sink.log("debug", `History (last ${HISTORY_CAPACITY} calls, most recent on top)`);
    this.sink.log("debug", `${"RETURN_CODE".padEnd(11)} PATH`);
    for (const entry of this.history) {
      this.sink.log("debug", `${String(entry.returnCode).padEnd(11)} ${entry.path}`);
    }
  }
}
