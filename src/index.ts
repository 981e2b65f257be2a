#!/usr/bin/env node

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { resolveConfig, saveConfig, type Config } from "./config.js";
import { connect } from "./controller.js";
import { ConfigurationError, NdError } from "./errors.js";
import { isLogLevel } from "./logger.js";
import { RestApiToGui, labeledOnly } from "./mapping.js";
import { formatMapping, formatNames, isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from "./output.js";
import { TemplateNames } from "./templates.js";
import { isVerb } from "./types.js";
import { VERSION } from "./version.js";

// ---------------------------------------------------------------------------
// CLI setup
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name("nd-api-to-gui")
  .version(VERSION)
  .description(
    "Map network-fabric controller template parameters (REST API keys) to the\n" +
    "GUI field names and sections they appear under.\n\n" +
    "Configuration (in priority order):\n" +
    "  1. CLI flags:      --ip4, --ip6, --username, --password, --domain\n" +
    "  2. Env vars:       ND_IP4, ND_IP6, ND_USERNAME, ND_PASSWORD, ND_DOMAIN\n" +
    "  3. Config file:    ~/.config/nd-api-to-gui/config.json\n\n" +
    "Quick start:\n" +
    "  $ nd-api-to-gui configure --ip4 192.0.2.10 --password YOUR_PASSWORD --insecure\n" +
    "  $ nd-api-to-gui templates\n" +
    "  $ nd-api-to-gui map Easy_Fabric --format text",
  )
  .option("--ip4 <address>", "Controller IPv4 address (preferred over --ip6)")
  .option("--ip6 <address>", "Controller IPv6 address")
  .option("--username <name>", "Login username (default: admin)")
  .option("--password <password>", "Login password")
  .option("--domain <domain>", "Login domain (default: local)")
  .option("--timeout <seconds>", "Per-request timeout in seconds (default: 30)")
  .option("--insecure", "Skip TLS certificate verification (for self-signed certs)")
  .option("--format <fmt>", `Output format: ${OUTPUT_FORMATS.join(", ")}`, "json")
  .option("--log-level <level>", "Diagnostics on stderr: debug, info, warn, error (default: warn)");

// ── configure ─────────────────────────────────────────────────────────

program
  .command("configure")
  .description("Save connection settings to ~/.config/nd-api-to-gui/config.json")
  .option("--ip4 <address>", "Controller IPv4 address")
  .option("--ip6 <address>", "Controller IPv6 address")
  .option("--username <name>", "Login username")
  .option("--password <password>", "Login password")
  .option("--domain <domain>", "Login domain")
  .option("--timeout <seconds>", "Per-request timeout in seconds")
  .option("--insecure", "Skip TLS certificate verification")
  .option("--log-level <level>", "Default diagnostics level")
  .action((opts: Record<string, unknown>) =>
    run(() => {
      const toSave: Partial<Config> = {};
      for (const key of ["ip4", "ip6", "username", "password", "domain"] as const) {
        const value = opts[key];
        if (typeof value === "string" && value) toSave[key] = value;
      }
      if (opts.timeout !== undefined) {
        const timeout = Number(opts.timeout);
        if (!Number.isInteger(timeout) || timeout <= 0) {
          throw new ConfigurationError(`--timeout must be a positive integer. Got ${String(opts.timeout)}.`);
        }
        toSave.timeout = timeout;
      }
      if (opts.insecure) toSave.insecure = true;
      if (opts.logLevel !== undefined) {
        if (!isLogLevel(opts.logLevel)) {
          throw new ConfigurationError(`--log-level must be one of debug, info, warn, error. Got ${String(opts.logLevel)}.`);
        }
        toSave.logLevel = opts.logLevel;
      }
      if (Object.keys(toSave).length === 0) {
        throw new ConfigurationError("Provide at least one setting, e.g. --ip4 or --password");
      }
      const path = saveConfig(toSave);
      console.log(JSON.stringify({ ok: true, saved: Object.keys(toSave), path }));
    }),
  );

// ── templates ─────────────────────────────────────────────────────────

program
  .command("templates")
  .description("List the configuration templates the controller supports")
  .action(() =>
    run(async () => {
      const { restSend, session } = await connect(resolveConfig(program.opts()));
      const names = await new TemplateNames(restSend).refresh();
      session.logHistory();
      console.log(formatNames(names, outputFormat()));
    }),
  );

// ── map ───────────────────────────────────────────────────────────────

program
  .command("map [templateName]")
  .description("Map a template's REST API keys to GUI field names (default template: MSD_Fabric)")
  .option("--include-unlabeled", "Keep parameters that have no GUI field name")
  .addHelpText(
    "after",
    "\nSome templates to try:\n" +
    "  Default_Network_Universal   Network configuration\n" +
    "  Default_VRF_Universal       VRF configuration\n" +
    "  Easy_Fabric                 VXLAN/EVPN fabrics\n" +
    "  Easy_Fabric_Classic         Classic LAN fabric\n" +
    "  MSD_Fabric                  Multi-Site fabrics",
  )
  .action((templateName: string | undefined, opts: Record<string, unknown>) =>
    run(async () => {
      const { restSend, session, sink } = await connect(resolveConfig(program.opts()));
      const mapping = await new RestApiToGui(restSend, sink).build(templateName ?? "MSD_Fabric");
      session.logHistory();
      console.log(formatMapping(opts.includeUnlabeled ? mapping : labeledOnly(mapping), outputFormat()));
    }),
  );

// ── raw ───────────────────────────────────────────────────────────────

program
  .command("raw <method> <path>")
  .description("Send one request (e.g. nd-api-to-gui raw GET /appcenter/...) and print the response and its classification")
  .option("-d, --data <json>", "Request body JSON (or @file.json, or - for stdin)")
  .action((method: string, path: string, opts: Record<string, unknown>) =>
    run(async () => {
      const verb = method.toUpperCase();
      if (!isVerb(verb)) {
        throw new ConfigurationError(`method must be one of DELETE, GET, POST, PUT. Got ${method}.`);
      }
      const payload = typeof opts.data === "string" ? await resolveBody(opts.data) : undefined;
      const { restSend } = await connect(resolveConfig(program.opts()));
      const outcome = await restSend.commit({ verb, path, payload });
      console.log(JSON.stringify(outcome, null, 2));
    }),
  );

// ── mcp ───────────────────────────────────────────────────────────────

program
  .command("mcp")
  .description("Start MCP server (stdio) exposing the template queries as LLM tools")
  .action(() =>
    run(async () => {
      const { startMcpServer } = await import("./mcp.js");
      await startMcpServer(undefined, { config: resolveConfig(program.opts()) });
    }),
  );

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function outputFormat(): OutputFormat {
  const format: unknown = program.opts().format;
  if (!isOutputFormat(format)) {
    throw new ConfigurationError(`--format must be one of ${OUTPUT_FORMATS.join(", ")}. Got ${String(format)}.`);
  }
  return format;
}

/** Print the failure as JSON on stderr and exit non-zero. */
async function run(action: () => void | Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err: unknown) {
    if (err instanceof NdError && err.detail !== undefined) {
      console.error(JSON.stringify({ error: err.message, detail: err.detail }, null, 2));
    } else {
      console.error(JSON.stringify({ error: err instanceof Error ? err.message : String(err) }));
    }
    process.exit(1);
  }
}

async function resolveBody(data: string): Promise<unknown> {
  try {
    if (data === "-") {
      const chunks: Buffer[] = [];
      for await (const chunk of process.stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
      }
      return JSON.parse(Buffer.concat(chunks).toString("utf-8"));
    }
    if (data.startsWith("@")) {
      return JSON.parse(readFileSync(data.slice(1), "utf-8"));
    }
    return JSON.parse(data);
  } catch (err) {
    throw new ConfigurationError(`--data is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(JSON.stringify({ error: String(err) }));
  process.exit(1);
});
