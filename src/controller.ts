import { requireConfig, toSessionConfig, type Config } from "./config.js";
import { createStderrSink, type DiagnosticSink } from "./logger.js";
import { RestSend } from "./rest-send.js";
import { Session } from "./session.js";

export interface Controller {
  session: Session;
  restSend: RestSend;
  sink: DiagnosticSink;
}

/** Logged-in session plus the RestSend the builders work through. */
export async function connect(config: Config, sink: DiagnosticSink = createStderrSink(config.logLevel)): Promise<Controller> {
  requireConfig(config);
  // Controllers ship with self-signed certificates
  if (config.insecure) process.env.NODE_TLS_REJECT_UNAUTHORIZED = "0";
  const session = new Session(toSessionConfig(config), { sink });
  await session.login();
  return { session, restSend: new RestSend({ sender: session, sink }), sink };
}
