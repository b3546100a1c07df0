import { Rule, RuleMatch } from "./types";

// Unicode letters, digits and underscore count as keyword characters.
const WORD = "[\\p{L}\\p{N}_]";
const NOT_AFTER_WORD = `(?<!${WORD})`;
const NOT_BEFORE_WORD = `(?!${WORD})`;
// Unicode whitespace plus the C0 separators U+001C..U+001F, without U+FEFF.
const SPACE =
  "[\\t\\n\\v\\f\\r\\x1c-\\x20\\x85\\xa0\\u1680\\u2000-\\u200a\\u2028\\u2029\\u202f\\u205f\\u3000]";

function keywordPattern(body: string, tail = ""): RegExp {
  return new RegExp(`${NOT_AFTER_WORD}${body}${NOT_BEFORE_WORD}${tail}`, "giu");
}

function matchPattern(pattern: RegExp): Rule["findAll"] {
  return function* (text: string): Generator<RuleMatch> {
    // fresh instance per scan, since a global RegExp carries lastIndex
    const regex = new RegExp(pattern.source, pattern.flags);
    for (const match of text.matchAll(regex)) {
      const start = match.index ?? 0;
      yield { start, end: start + match[0].length, text: match[0] };
    }
  };
}

export const SET_EXTENDED_CHECK = keywordPattern(`SET${SPACE}+EXTENDED${SPACE}+CHECK`);

// BREAK-POINT, BREAK-POINT ID, BREAK-POINT <var>
export const BREAK_POINT = keywordPattern("BREAK-POINT", `(?:${SPACE}+${WORD}+)?`);

export const rules: readonly Rule[] = [
  {
    id: "Rule303_SetExtendedCheck",
    title: "Obsolete SET EXTENDED CHECK statement",
    severity: "error",
    message: "Obsolete SET EXTENDED CHECK statement detected.",
    suggestion: "Remove the SET EXTENDED CHECK statement entirely.",
    findAll: matchPattern(SET_EXTENDED_CHECK),
  },
  {
    id: "Rule304_BreakPointUsage",
    title: "BREAK-POINT statement in released code",
    severity: "error",
    message: "BREAK-POINT is not allowed in ABAP Cloud / Key User scenarios.",
    suggestion: "Remove or comment out the BREAK-POINT statement.",
    findAll: matchPattern(BREAK_POINT),
  },
];
