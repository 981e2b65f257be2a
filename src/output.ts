import type { GuiMapping } from "./mapping.js";

export type OutputFormat = "json" | "jsonl" | "table" | "text";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["json", "jsonl", "table", "text"];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === "string" && (OUTPUT_FORMATS as readonly string[]).includes(value);
}

export interface MappingRow {
  apiKey: string;
  description: string;
  section: string;
  displayName: string;
}

/** Mapping as sorted rows, one per REST parameter key */
export function mappingRows(mapping: GuiMapping): MappingRow[] {
  return Object.keys(mapping)
    .sort()
    .map((apiKey) => ({
      apiKey,
      description: mapping[apiKey].description ?? "",
      section: mapping[apiKey].section ?? "",
      displayName: mapping[apiKey].displayName ?? "",
    }));
}

export function formatMapping(mapping: GuiMapping, format: OutputFormat): string {
  switch (format) {
    case "json":
      return JSON.stringify(mapping, null, 2);
    case "jsonl":
      return mappingRows(mapping).map((row) => JSON.stringify(row)).join("\n");
    case "table":
      return formatTable(mappingRows(mapping));
    case "text":
      return formatMappingText(mapping);
  }
}

function formatMappingText(mapping: GuiMapping): string {
  const blocks = mappingRows(mapping).map(
    (row) =>
      `API Key: ${row.apiKey}:\n` +
      `  Description: ${row.description}\n` +
      `  GUI Section: ${row.section}\n` +
      `  GUI Field Name: ${row.displayName}\n`,
  );
  return [
    "If GUI Section is blank, the parameter is likely located in General Parameters.",
    ...blocks,
  ].join("\n");
}

export function formatNames(names: string[], format: OutputFormat): string {
  switch (format) {
    case "json":
      return JSON.stringify(names, null, 2);
    case "jsonl":
      return names.map((name) => JSON.stringify(name)).join("\n");
    case "table":
      return formatTable(names.map((name) => ({ name })));
    case "text":
      return names.map((name) => `- ${name}`).join("\n");
  }
}

export function formatTable(items: object[]): string {
  if (!items.length) return "(no results)";

  const rows = items.map((item) => Object.entries(item));
  const keys = [...new Set(rows.flatMap((entries) => entries.map(([k]) => k)))];
  const records = rows.map((entries) => new Map<string, unknown>(entries));

  const fmt = (v: unknown): string => {
    if (v === null || v === undefined) return "";
    if (typeof v === "object") return JSON.stringify(v);
    return String(v);
  };

  const widths = keys.map((k) => {
    const vals = records.map((record) => fmt(record.get(k)));
    return Math.min(60, Math.max(k.length, ...vals.map((v) => v.length)));
  });

  const header = keys.map((k, i) => k.padEnd(widths[i])).join("  ");
  const sep = widths.map((w) => "─".repeat(w)).join("──");
  const body = records.map((record) =>
    keys
      .map((k, i) => {
        const s = fmt(record.get(k));
        return s.length > widths[i] ? s.slice(0, widths[i] - 1) + "…" : s.padEnd(widths[i]);
      })
      .join("  "),
  );

  return [header, sep, ...body].join("\n");
}
