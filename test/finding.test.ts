import { describe, expect, test } from "vitest";
import { buildFinding, LineIndex } from "../src/finding";
import { rules } from "../src/rules";
import { Unit } from "../src/types";

function unit(code: string, startLine = 0): Unit {
  return {
    pgm_name: "ZPROG",
    inc_name: "ZPROG_F01",
    type: "method",
    name: "RUN",
    class_implementation: "ZCL_RUNNER",
    start_line: startLine,
    end_line: startLine + 10,
    code,
    findings: null,
  };
}

describe("LineIndex", () => {
  test("returns the whole physical line around an offset", () => {
    const lines = new LineIndex("first\n  second line\nthird");

    expect(lines.lineAt(10)).toBe("  second line");
  });

  test("handles the first and last line", () => {
    expect(new LineIndex("only").lineAt(0)).toBe("only");
    expect(new LineIndex("a\nlast").lineAt(3)).toBe("last");
  });

  test("keeps carriage returns", () => {
    expect(new LineIndex("one\r\ntwo\r\n").lineAt(5)).toBe("two\r");
  });

  test("counts breaks strictly before the offset", () => {
    const lines = new LineIndex("a\nb\nc");

    expect(lines.breaksBefore(0)).toBe(0);
    expect(lines.breaksBefore(1)).toBe(0);
    expect(lines.breaksBefore(2)).toBe(1);
    expect(lines.breaksBefore(4)).toBe(2);
  });

  test("treats an offset on a line break as the end of that line", () => {
    const lines = new LineIndex("ab\ncd");

    expect(lines.breaksBefore(2)).toBe(0);
    expect(lines.lineAt(2)).toBe("ab");
  });
});

describe("buildFinding", () => {
  test("adds the 1-based line within the unit to start_line", () => {
    const source = "DATA: lv_x TYPE i.\nBREAK-POINT.\n";
    const finding = buildFinding(unit(source, 100), rules[1], {
      start: 19,
      end: 30,
      text: "BREAK-POINT",
    });

    expect(finding).toEqual({
      prog_name: "ZPROG",
      incl_name: "ZPROG_F01",
      types: "method",
      blockname: "RUN",
      starting_line: 102,
      ending_line: 102,
      issues_type: "Rule304_BreakPointUsage",
      severity: "error",
      message: "BREAK-POINT is not allowed in ABAP Cloud / Key User scenarios.",
      suggestion: "Remove or comment out the BREAK-POINT statement.",
      snippet: "BREAK-POINT.",
    });
  });

  test("reports start_line + 1 for a match on the first line", () => {
    const finding = buildFinding(unit("SET EXTENDED CHECK OFF.", 7), rules[0], {
      start: 0,
      end: 18,
      text: "SET EXTENDED CHECK",
    });

    expect(finding.starting_line).toBe(8);
    expect(finding.snippet).toBe("SET EXTENDED CHECK OFF.");
  });

  test("treats null code as empty text", () => {
    const finding = buildFinding({ ...unit("", 3), code: null }, rules[0], {
      start: 0,
      end: 0,
      text: "",
    });

    expect(finding.starting_line).toBe(4);
    expect(finding.snippet).toBe("");
  });
});
