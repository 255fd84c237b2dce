import { describe, expect, it } from "vitest";
import { parseMarkdownTable } from "./markdownTable";

describe("parseMarkdownTable", () => {
  it("reads header and data rows and skips the divider", () => {
    const table = parseMarkdownTable("| a | b |\n|---|---|\n| 1 | 2 |");
    expect(table).toEqual({ header: ["a", "b"], rows: [["1", "2"]] });
  });

  it("accepts rows without outer pipes and stray indentation", () => {
    const table = parseMarkdownTable("  name | role\n ---|---\nAda | admin \n\n");
    expect(table).toEqual({ header: ["name", "role"], rows: [["Ada", "admin"]] });
  });

  it("pads short rows and cuts long ones to the header width", () => {
    const table = parseMarkdownTable("| a | b | c |\n|-|-|-|\n| 1 |\n| 1 | 2 | 3 | 4 |");
    expect(table.rows).toEqual([
      ["1", "", ""],
      ["1", "2", "3"],
    ]);
  });

  it("returns no rows for a header-only grid", () => {
    expect(parseMarkdownTable("| a | b |\n|---|---|").rows).toEqual([]);
    expect(parseMarkdownTable("")).toEqual({ header: [], rows: [] });
  });
});
