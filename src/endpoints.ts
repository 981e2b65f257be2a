import type { Verb } from "./types.js";

export interface Endpoint {
  verb: Verb;
  path: string;
}

const CONFIG_TEMPLATES = "/appcenter/cisco/ndfc/api/v1/configtemplate/rest/config/templates";

/** Every configuration template the controller knows about */
export function templatesEndpoint(): Endpoint {
  return { verb: "GET", path: CONFIG_TEMPLATES };
}

/** One template, including its parameter list */
export function templateEndpoint(name: string): Endpoint {
  return { verb: "GET", path: `${CONFIG_TEMPLATES}/${encodeURIComponent(name)}` };
}
