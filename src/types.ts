export type Severity = "error";

export interface RuleMatch {
  start: number;
  end: number;
  text: string;
}

export interface Rule {
  id: string;
  title: string;
  severity: Severity;
  message: string;
  suggestion: string;
  findAll: (text: string) => Iterable<RuleMatch>;
}

export interface Finding {
  prog_name: string;
  incl_name: string;
  types: string;
  blockname: string | null;
  starting_line: number;
  ending_line: number;
  issues_type: string;
  severity: Severity;
  message: string;
  suggestion: string;
  snippet: string;
}

export interface Unit {
  pgm_name: string;
  inc_name: string;
  type: string;
  name: string | null;
  class_implementation: string | null;
  start_line: number;
  end_line: number;
  code: string | null;
  findings: Finding[] | null;
}

export interface ScanSummary {
  units: number;
  findings: number;
  byRule: Record<string, number>;
}
