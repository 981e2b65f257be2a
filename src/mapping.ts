import { ConfigurationError } from "./errors.js";
import { silentSink, type DiagnosticSink } from "./logger.js";
import { parseTemplateParameters, type ParameterInfo } from "./param-info.js";
import type { RestSend } from "./rest-send.js";
import { TemplateGet } from "./templates.js";

export interface GuiField {
  description?: string;
  displayName?: string;
  section?: string;
}

/** REST parameter key → where it shows up in the GUI */
export type GuiMapping = Record<string, GuiField>;

function skip(param: ParameterInfo): boolean {
  return (
    param.internal ||
    param.section === "Hidden" ||
    param.name.includes("_PREV") ||
    param.name.includes("DCNM_ID")
  );
}

export function buildGuiMapping(parameters: ParameterInfo[]): GuiMapping {
  const mapping: GuiMapping = {};
  for (const param of parameters) {
    if (skip(param)) continue;
    const field: GuiField = {};
    if (param.description) field.description = param.description;
    if (param.displayName) field.displayName = param.displayName;
    if (param.section) field.section = param.section;
    mapping[param.name] = field;
  }
  return mapping;
}

/** Drop parameters the GUI gives no label to. */
export function labeledOnly(mapping: GuiMapping): GuiMapping {
  return Object.fromEntries(Object.entries(mapping).filter(([, field]) => field.displayName));
}

/**
 * Translation table from a template's REST parameter keys to GUI labels.
 *
 * ```ts
 * const builder = new RestApiToGui(restSend);
 * const mapping = await builder.build("MSD_Fabric");
 * for (const name of builder.parameterNames) console.log(name, mapping[name].displayName);
 * ```
 */
export class RestApiToGui {
  private _mapping: GuiMapping | undefined;

  constructor(
    private readonly restSend: RestSend,
    private readonly sink: DiagnosticSink = silentSink,
  ) {}

  get mapping(): GuiMapping {
    if (!this._mapping) {
      throw new ConfigurationError("Call RestApiToGui.build() before reading the mapping");
    }
    return this._mapping;
  }

  /** Sorted REST parameter keys of the last build */
  get parameterNames(): string[] {
    return Object.keys(this.mapping).sort();
  }

  async build(templateName: string): Promise<GuiMapping> {
    this.sink.log("debug", `RestApiToGui.build: retrieving template ${templateName}`);
    const template = await new TemplateGet(this.restSend).refresh(templateName);
    const parameters = parseTemplateParameters(template);
    this._mapping = buildGuiMapping(parameters);
    this.sink.log(
      "debug",
      `RestApiToGui.build: ${templateName} has ${parameters.length} parameters, ${Object.keys(this._mapping).length} mapped`,
    );
    return this._mapping;
  }
}
