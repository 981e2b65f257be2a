import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { resolveConfig, type Config } from "./config.js";
import { connect, type Controller } from "./controller.js";
import { NdError } from "./errors.js";
import { createStderrSink, type DiagnosticSink } from "./logger.js";
import { RestApiToGui, labeledOnly } from "./mapping.js";
import { TemplateNames } from "./templates.js";
import { isVerb } from "./types.js";
import { VERSION } from "./version.js";

export interface McpServerOptions {
  config?: Config;
  sink?: DiagnosticSink;
}

// ---------------------------------------------------------------------------
// Tool definitions
// ---------------------------------------------------------------------------

const TOOLS = [
  {
    name: "list_templates",
    description: "List the configuration templates the controller supports",
    inputSchema: { type: "object" as const, properties: {} },
  },
  {
    name: "map_template",
    description:
      "Map a template's REST API parameter keys to their GUI field names, sections and descriptions",
    inputSchema: {
      type: "object" as const,
      properties: {
        templateName: { type: "string", description: "Template name, e.g. Easy_Fabric or MSD_Fabric" },
        includeUnlabeled: {
          type: "boolean",
          description: "Keep parameters that have no GUI field name (default false)",
        },
      },
      required: ["templateName"],
    },
  },
  {
    name: "controller_request",
    description: "Send one REST request to the controller and return the raw response and its classification",
    inputSchema: {
      type: "object" as const,
      properties: {
        method: { type: "string", enum: ["GET", "POST", "PUT", "DELETE"] },
        path: { type: "string", description: "Endpoint path, e.g. /appcenter/cisco/ndfc/api/v1/..." },
        body: { type: "object", description: "JSON request body", additionalProperties: true },
      },
      required: ["method", "path"],
    },
  },
];

function textResult(value: unknown, isError = false) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

function errorResult(err: unknown) {
  if (err instanceof NdError) {
    return textResult({ error: err.message, detail: err.detail }, true);
  }
  return textResult({ error: err instanceof Error ? err.message : String(err) }, true);
}

// ---------------------------------------------------------------------------
// MCP Server
// ---------------------------------------------------------------------------

export async function startMcpServer(customTransport?: Transport, options: McpServerOptions = {}): Promise<Server> {
  const server = new Server({ name: "nd-api-to-gui", version: VERSION }, { capabilities: { tools: {} } });

  // One session for the life of the server. Tool calls queue behind each
  // other so that no two of them touch the session at once.
  let tail: Promise<void> = Promise.resolve();
  function serialized<T>(fn: () => Promise<T>): Promise<T> {
    const next = tail.then(fn);
    tail = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  let controller: Promise<Controller> | undefined;
  function getController(): Promise<Controller> {
    if (!controller) {
      const config = options.config ?? resolveConfig({});
      controller = connect(config, options.sink ?? createStderrSink(config.logLevel));
      // A failed login must not stick; the next tool call tries again.
      void controller.catch(() => {
        controller = undefined;
      });
    }
    return controller;
  }

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, (request) => serialized(async () => {
    const { name } = request.params;
    const args = request.params.arguments ?? {};

    try {
      switch (name) {
        case "list_templates": {
          const { restSend } = await getController();
          return textResult(await new TemplateNames(restSend).refresh());
        }
        case "map_template": {
          if (typeof args.templateName !== "string" || !args.templateName) {
            return textResult({ error: "templateName is required" }, true);
          }
          const { restSend, sink } = await getController();
          const mapping = await new RestApiToGui(restSend, sink).build(args.templateName);
          return textResult(args.includeUnlabeled === true ? mapping : labeledOnly(mapping));
        }
        case "controller_request": {
          const method = typeof args.method === "string" ? args.method.toUpperCase() : "";
          if (!isVerb(method) || typeof args.path !== "string" || !args.path) {
            return textResult({ error: "method (GET, POST, PUT, DELETE) and path are required" }, true);
          }
          const { restSend } = await getController();
          return textResult(await restSend.commit({ verb: method, path: args.path, payload: args.body }));
        }
        default:
          return textResult({ error: `Unknown tool: ${name}` }, true);
      }
    } catch (err: unknown) {
      return errorResult(err);
    }
  }));

  await server.connect(customTransport ?? new StdioServerTransport());
  return server;
}
