import { describe, expect, test } from "vitest";
import type { GuiMapping } from "../mapping.js";
import { formatMapping, formatNames, formatTable, isOutputFormat, mappingRows } from "../output.js";

const MAPPING: GuiMapping = {
  FABRIC_NAME: { description: "Name of the fabric", displayName: "Fabric Name", section: "General" },
  BGP_AS: { displayName: "BGP ASN" },
};

describe("mappingRows", () => {
  test("sorts by API key and fills blanks", () => {
    expect(mappingRows(MAPPING)).toEqual([
      { apiKey: "BGP_AS", description: "", section: "", displayName: "BGP ASN" },
      { apiKey: "FABRIC_NAME", description: "Name of the fabric", section: "General", displayName: "Fabric Name" },
    ]);
  });
});

describe("formatMapping", () => {
  test("json format pretty-prints the mapping", () => {
    expect(formatMapping(MAPPING, "json")).toBe(JSON.stringify(MAPPING, null, 2));
  });

  test("jsonl format outputs one row per line", () => {
    const lines = formatMapping(MAPPING, "jsonl").split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual({ apiKey: "BGP_AS", description: "", section: "", displayName: "BGP ASN" });
  });

  test("text format lists each key with its GUI location", () => {
    expect(formatMapping({ BGP_AS: { displayName: "BGP ASN", section: "General" } }, "text")).toBe(
      "If GUI Section is blank, the parameter is likely located in General Parameters.\n" +
        "API Key: BGP_AS:\n" +
        "  Description: \n" +
        "  GUI Section: General\n" +
        "  GUI Field Name: BGP ASN\n",
    );
  });

  test("table format has a header, separator and one row per key", () => {
    const lines = formatMapping(MAPPING, "table").split("\n");
    expect(lines).toHaveLength(4);
    expect(lines[0].split(/\s+/)).toEqual(["apiKey", "description", "section", "displayName"]);
    expect(lines[1]).toMatch(/^─+$/);
    expect(lines[2].startsWith("BGP_AS ")).toBe(true);
  });
});

describe("formatNames", () => {
  test("text format is a bullet list", () => {
    expect(formatNames(["Easy_Fabric", "MSD_Fabric"], "text")).toBe("- Easy_Fabric\n- MSD_Fabric");
  });

  test("table format uses a name column", () => {
    expect(formatNames(["Easy_Fabric"], "table")).toBe("name       \n───────────\nEasy_Fabric");
  });
});

describe("formatTable", () => {
  test("pads columns to the widest value", () => {
    const result = formatTable([
      { name: "foo", value: 1 },
      { name: "bar", value: 2 },
    ]);
    expect(result.split("\n")).toEqual(["name  value", "─".repeat(11), "foo   1    ", "bar   2    "]);
  });

  test("handles an empty list", () => {
    expect(formatTable([])).toBe("(no results)");
  });
});

test("isOutputFormat accepts only known formats", () => {
  expect(isOutputFormat("table")).toBe(true);
  expect(isOutputFormat("yaml")).toBe(false);
});
