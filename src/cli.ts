import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { parseArgs } from "./args";
import { loadConfig } from "./config";
import { formatPrettyOutput } from "./output";
import { createRuleRegistry } from "./registry";
import { scanUnits, summarizeFindings, withFindingsOnly } from "./scanner";
import { validateUnit, validateUnits } from "./validate";
import { Unit } from "./types";
import { VERSION } from "./version";

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    return;
  }

  if (args.version) {
    console.log(VERSION);
    return;
  }

  const config = loadConfig();
  const registry = createRuleRegistry({
    disableRules: [...config.disableRules, ...args.disableRules],
  });

  if (args.listRules) {
    for (const rule of registry.rules) {
      console.log(`${rule.id} - ${rule.title}`);
      console.log(`  ${rule.message}`);
      console.log("");
    }
    return;
  }

  const units = parseUnits(await readInput(args.input));
  const scanned = scanUnits(units, registry);
  const reported = args.all ? scanned : withFindingsOnly(scanned);

  if (args.format === "json") {
    console.log(JSON.stringify(reported, null, 2));
  } else {
    console.log(formatPrettyOutput(reported));
  }

  if (summarizeFindings(reported).findings > 0) {
    process.exitCode = 1;
  }
}

function parseUnits(text: string): Unit[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new Error("Input is not valid JSON");
  }

  return Array.isArray(raw) ? validateUnits(raw) : [validateUnit(raw)];
}

async function readInput(input?: string): Promise<string> {
  if (input) {
    if (!existsSync(input)) {
      throw new Error(`Input file not found: ${input}`);
    }

    return readFile(input, "utf8");
  }

  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

function printHelp(): void {
  console.log(`stmtguard ${VERSION}

Usage:
  stmtguard [--input <units.json>] [--format pretty|json] [--all] [--disable-rule <id>]...
  stmtguard --list-rules

Reads one unit or an array of units as JSON from --input or stdin.

Options:
  --input <file>       Read units from a file instead of stdin
  --format <mode>      Output format: pretty | json (default: pretty)
  --all                Also print units without findings
  --disable-rule <id>  Skip a rule (repeatable)
  --list-rules         Show active rules
  -h, --help           Show help
  -v, --version        Show version`);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`stmtguard error: ${message}`);
  process.exit(2);
});
