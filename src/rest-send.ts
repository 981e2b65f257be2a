import { ResponseHandler } from "./response-handler.js";
import type { Sender } from "./session.js";
import { silentSink, type DiagnosticSink } from "./logger.js";
import type { Outcome, PendingRequest, RawResponse } from "./types.js";

export interface RestSendOptions {
  sender: Sender;
  responseHandler?: ResponseHandler;
  sink?: DiagnosticSink;
  /** Skip non-GET requests and report them as if the controller accepted them */
  checkMode?: boolean;
  /** On a 401, refresh the login once and resend once (default true) */
  refreshOnUnauthorized?: boolean;
}

export interface RestSendResult {
  response: RawResponse;
  result: Outcome;
}

/**
 * One logical controller operation: send through the session, classify
 * through the response handler, keep a record of both.
 */
export class RestSend {
  readonly checkMode: boolean;
  readonly responses: RawResponse[] = [];
  readonly results: Outcome[] = [];
  private readonly sender: Sender;
  private readonly handler: ResponseHandler;
  private readonly sink: DiagnosticSink;
  private readonly refreshOnUnauthorized: boolean;

  constructor(options: RestSendOptions) {
    this.sender = options.sender;
    this.sink = options.sink ?? silentSink;
    this.handler = options.responseHandler ?? new ResponseHandler(this.sink);
    this.checkMode = options.checkMode ?? false;
    this.refreshOnUnauthorized = options.refreshOnUnauthorized ?? true;
  }

  get responseCurrent(): RawResponse | undefined {
    return this.responses[this.responses.length - 1];
  }

  get resultCurrent(): Outcome | undefined {
    return this.results[this.results.length - 1];
  }

  async commit(request: PendingRequest): Promise<RestSendResult> {
    const response = await this.dispatch(request);
    this.handler.verb = request.verb;
    this.handler.response = response;
    this.handler.commit();
    const result = this.handler.result;
    this.responses.push(response);
    this.results.push(result);
    return { response, result };
  }

  private async dispatch(request: PendingRequest): Promise<RawResponse> {
    if (this.checkMode && request.verb !== "GET") {
      this.sink.log("info", `RestSend.commit: check mode, not sending ${request.verb} ${request.path}`);
      return {
        returnCode: 200,
        message: "OK",
        data: {},
        method: request.verb,
        requestPath: request.path,
      };
    }

    const response = await this.sender.send(request);
    if (response.returnCode !== 401 || !this.refreshOnUnauthorized) {
      return response;
    }

    this.sink.log("info", `RestSend.commit: ${request.verb} ${request.path} returned 401, refreshing login`);
    await this.sender.refreshLogin();
    return this.sender.send(request);
  }
}
