import { buildFinding, LineIndex } from "./finding";
import { DEFAULT_REGISTRY, RuleRegistry } from "./registry";
import { Finding, ScanSummary, Unit } from "./types";

export function scanUnit(
  unit: Unit,
  registry: RuleRegistry = DEFAULT_REGISTRY,
): Unit {
  const source = unit.code ?? "";
  const lines = new LineIndex(source);
  const findings: Finding[] = [];

  for (const rule of registry.rules) {
    for (const match of rule.findAll(source)) {
      findings.push(buildFinding(unit, rule, match, lines));
    }
  }

  return {
    ...unit,
    findings: findings.length > 0 ? findings : null,
  };
}

export function scanUnits(
  units: readonly Unit[],
  registry: RuleRegistry = DEFAULT_REGISTRY,
): Unit[] {
  return units.map((unit) => scanUnit(unit, registry));
}

export function withFindingsOnly(units: readonly Unit[]): Unit[] {
  return units.filter((unit) => (unit.findings?.length ?? 0) > 0);
}

export function summarizeFindings(units: readonly Unit[]): ScanSummary {
  const byRule: Record<string, number> = {};
  let total = 0;

  for (const unit of units) {
    for (const finding of unit.findings ?? []) {
      byRule[finding.issues_type] = (byRule[finding.issues_type] ?? 0) + 1;
      total += 1;
    }
  }

  return {
    units: units.length,
    findings: total,
    byRule,
  };
}
