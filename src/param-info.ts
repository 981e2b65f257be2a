import { isRecord } from "./types.js";

export interface ParameterInfo {
  name: string;
  description: string;
  displayName: string;
  /** GUI tab the parameter appears on ("" means General Parameters) */
  section: string;
  /** Set by the template for values the GUI never shows */
  internal: boolean;
}

/** Template annotations are often stored with their quotes: "\"General\"". */
function annotation(annotations: Record<string, unknown>, key: string): string {
  const value = annotations[key];
  if (typeof value !== "string") return "";
  const trimmed = value.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

export function parseTemplateParameters(template: Record<string, unknown>): ParameterInfo[] {
  const parameters = Array.isArray(template.parameters) ? template.parameters : [];
  const out: ParameterInfo[] = [];
  for (const param of parameters) {
    if (!isRecord(param) || typeof param.name !== "string" || !param.name) continue;
    const annotations = isRecord(param.annotations) ? param.annotations : {};
    out.push({
      name: param.name,
      description: annotation(annotations, "Description"),
      displayName: annotation(annotations, "DisplayName"),
      section: annotation(annotations, "Section"),
      internal: annotation(annotations, "IsInternal").toLowerCase() === "true",
    });
  }
  return out;
}
