import { Finding, Rule, RuleMatch, Unit } from "./types";

/**
 * Line-break offsets of one text, collected once and binary-searched per match.
 */
export class LineIndex {
  private readonly breaks: number[] = [];

  constructor(private readonly text: string) {
    for (let at = text.indexOf("\n"); at !== -1; at = text.indexOf("\n", at + 1)) {
      this.breaks.push(at);
    }
  }

  /** Number of line breaks strictly before `offset`. */
  breaksBefore(offset: number): number {
    let low = 0;
    let high = this.breaks.length;

    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.breaks[mid] < offset) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }

    return low;
  }

  /** The physical line containing `offset`, without its line break. */
  lineAt(offset: number): string {
    const index = this.breaksBefore(offset);
    const start = index > 0 ? this.breaks[index - 1] + 1 : 0;
    const end = index < this.breaks.length ? this.breaks[index] : this.text.length;

    return this.text.slice(start, end);
  }
}

/**
 * Builds the finding for one match in `unit.code`.
 *
 * The absolute line is `start_line` plus the 1-based line within the unit, so a
 * match on the unit's first line reports `start_line + 1`. Consumers rely on
 * that arithmetic; keep it.
 */
export function buildFinding(
  unit: Unit,
  rule: Rule,
  match: RuleMatch,
  lines: LineIndex = new LineIndex(unit.code ?? ""),
): Finding {
  const lineInBlock = lines.breaksBefore(match.start) + 1;
  const line = unit.start_line + lineInBlock;

  return {
    prog_name: unit.pgm_name,
    incl_name: unit.inc_name,
    types: unit.type,
    blockname: unit.name,
    starting_line: line,
    ending_line: line,
    issues_type: rule.id,
    severity: rule.severity,
    message: rule.message,
    suggestion: rule.suggestion,
    snippet: lines.lineAt(match.start).replace(/\n/g, "\\n"),
  };
}
