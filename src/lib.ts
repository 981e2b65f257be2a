export {
  NdError,
  ConfigurationError,
  TransportError,
  AuthenticationError,
  ResponseInputError,
  ControllerResponseError,
} from "./errors.js";
export type { NdErrorOptions } from "./errors.js";
export { createStderrSink, silentSink } from "./logger.js";
export type { DiagnosticSink, LogLevel } from "./logger.js";
export { RingBuffer } from "./history.js";
export { VERBS, isVerb } from "./types.js";
export type { ChangeOutcome, GetOutcome, Outcome, PendingRequest, RawResponse, Verb } from "./types.js";
export { ResponseHandler, classifyResponse } from "./response-handler.js";
export { Session, DEFAULT_TIMEOUT, HISTORY_CAPACITY } from "./session.js";
export type { HistoryEntry, Sender, SessionConfig, SessionOptions } from "./session.js";
export { RestSend } from "./rest-send.js";
export type { RestSendOptions, RestSendResult } from "./rest-send.js";
export { templateEndpoint, templatesEndpoint } from "./endpoints.js";
export { TemplateGet, TemplateNames } from "./templates.js";
export type { Template } from "./templates.js";
export { parseTemplateParameters } from "./param-info.js";
export type { ParameterInfo } from "./param-info.js";
export { RestApiToGui, buildGuiMapping, labeledOnly } from "./mapping.js";
export type { GuiField, GuiMapping } from "./mapping.js";
