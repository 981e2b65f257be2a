import { templateEndpoint, templatesEndpoint } from "./endpoints.js";
import { ConfigurationError, ControllerResponseError } from "./errors.js";
import type { RestSend } from "./rest-send.js";
import { isRecord } from "./types.js";

export type Template = Record<string, unknown>;

/** Names of the configuration templates the controller supports. */
export class TemplateNames {
  private _templateNames: string[] = [];

  constructor(private readonly restSend: RestSend) {}

  get templateNames(): string[] {
    return [...this._templateNames];
  }

  async refresh(): Promise<string[]> {
    const { response } = await this.restSend.commit(templatesEndpoint());
    if (response.returnCode !== 200) {
      throw new ControllerResponseError(
        `Failed to retrieve template names. RETURN_CODE: ${response.returnCode}. MESSAGE: ${response.message}.`,
        { detail: response },
      );
    }
    const items = Array.isArray(response.data) ? response.data : [];
    this._templateNames = items
      .map((item) => (isRecord(item) ? item.name : undefined))
      .filter((name): name is string => typeof name === "string" && name !== "");
    return this.templateNames;
  }
}

/** One configuration template, as the controller stores it. */
export class TemplateGet {
  private _template: Template | undefined;

  constructor(private readonly restSend: RestSend) {}

  get template(): Template | undefined {
    return this._template;
  }

  async refresh(templateName: string): Promise<Template> {
    if (!templateName) {
      throw new ConfigurationError("templateName must be set before retrieving a template");
    }
    const { response, result } = await this.restSend.commit(templateEndpoint(templateName));
    if (!result.success) {
      throw new ControllerResponseError(
        `Failed to retrieve template ${templateName}. RETURN_CODE: ${response.returnCode}. MESSAGE: ${response.message}.`,
        { detail: response },
      );
    }
    if ("found" in result && !result.found) {
      throw new ControllerResponseError(`Template ${templateName} not found on the controller`, { detail: response });
    }
    if (!isRecord(response.data)) {
      throw new ControllerResponseError(`Template ${templateName}: expected an object from the controller`, {
        detail: response,
      });
    }
    this._template = response.data;
    return response.data;
  }
}
