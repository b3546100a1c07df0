import { summarizeFindings } from "./scanner";
import { Unit } from "./types";

export function formatPrettyOutput(units: readonly Unit[]): string {
  const summary = summarizeFindings(units);
  if (summary.findings === 0) {
    return "No monitored statements found.";
  }

  const lines: string[] = [];
  lines.push("stmtguard findings");
  lines.push("");

  for (const unit of units) {
    for (const finding of unit.findings ?? []) {
      const block = finding.blockname ? ` ${finding.blockname}` : "";
      lines.push(`[${finding.severity.toUpperCase()}] ${finding.issues_type}`);
      lines.push(
        `  at ${finding.prog_name}/${finding.incl_name} (${finding.types}${block}) line ${finding.starting_line}`,
      );
      lines.push(`  ${finding.message}`);
      lines.push(`  > ${finding.snippet}`);
      lines.push(`  fix: ${finding.suggestion}`);
      lines.push("");
    }
  }

  const perRule = Object.entries(summary.byRule)
    .map(([id, count]) => `${id}=${count}`)
    .join(", ");
  lines.push(`Summary: units=${summary.units}, findings=${summary.findings} (${perRule})`);

  return lines.join("\n");
}
