import { describe, expect, test } from "vitest";
import { color, formatStatusLine, formatSummary, ui, VERSION } from "../../src/cli/ui";

describe("CLI UI utilities", () => {
  describe("ui object", () => {
    test("has all required methods", () => {
      expect(typeof ui.intro).toBe("function");
      expect(typeof ui.outro).toBe("function");
      expect(typeof ui.cancel).toBe("function");
      expect(typeof ui.note).toBe("function");
      expect(typeof ui.info).toBe("function");
      expect(typeof ui.warn).toBe("function");
      expect(typeof ui.error).toBe("function");
      expect(typeof ui.message).toBe("function");
      expect(typeof ui.spinner).toBe("function");
    });
  });

  test("VERSION comes from package.json", () => {
    expect(VERSION).toMatch(/^\d+\.\d+\.\d+/);
  });

  describe("formatSummary", () => {
    test("aligns labels to the longest one", () => {
      const result = formatSummary([
        { label: "Status", value: "completed" },
        { label: "Duration", value: "1.5s" },
      ]);

      expect(result).toBe(
        `${color.dim("Status  ")}  completed\n${color.dim("Duration")}  1.5s`,
      );
    });

    test("filters out null and undefined values", () => {
      const result = formatSummary([
        { label: "Present", value: "yes" },
        { label: "Missing", value: null },
        { label: "Undefined", value: undefined },
      ]);

      expect(result).toBe(`${color.dim("Present")}  yes`);
    });

    test("keeps zero", () => {
      expect(formatSummary([{ label: "Errno", value: 0 }])).toBe(`${color.dim("Errno")}  0`);
    });

    test("handles empty array", () => {
      expect(formatSummary([])).toBe("");
    });
  });

  describe("formatStatusLine", () => {
    test("shows percent, files, bytes and the current file", () => {
      const line = formatStatusLine({
        percent: 42,
        bytesDone: 475607,
        files: { done: 12, total: 17 },
        current: { source: "/data/db/foo" },
      });

      expect(line).toBe("42.00% · 12/17 files · 464.46 KB · /data/db/foo");
    });

    test("omits the current file before the first one is known", () => {
      const line = formatStatusLine({ percent: 0, bytesDone: 0, files: { done: 0, total: 0 } });

      expect(line).toBe("0.00% · 0/0 files · 0 B");
    });

    test("never shows a negative done count", () => {
      const line = formatStatusLine({ percent: 0, bytesDone: 0, files: { done: -1, total: 3 } });

      expect(line).toBe("0.00% · 0/3 files · 0 B");
    });
  });
});
