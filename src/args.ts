export interface CliArgs {
  input?: string;
  format: "pretty" | "json";
  all: boolean;
  disableRules: string[];
  listRules: boolean;
  help: boolean;
  version: boolean;
}

export function parseArgs(raw: string[]): CliArgs {
  const args: CliArgs = {
    format: "pretty",
    all: false,
    disableRules: [],
    listRules: false,
    help: false,
    version: false,
  };

  for (let i = 0; i < raw.length; i += 1) {
    const arg = raw[i];

    if (arg === "--help" || arg === "-h") {
      args.help = true;
      continue;
    }

    if (arg === "--version" || arg === "-v") {
      args.version = true;
      continue;
    }

    if (arg === "--all") {
      args.all = true;
      continue;
    }

    if (arg === "--list-rules") {
      args.listRules = true;
      continue;
    }

    if (arg === "--input") {
      const value = raw[i + 1];
      if (!value) {
        throw new Error("--input requires a file path");
      }
      args.input = value;
      i += 1;
      continue;
    }

    if (arg === "--disable-rule") {
      const value = raw[i + 1];
      if (!value) {
        throw new Error("--disable-rule requires a rule id");
      }
      args.disableRules.push(value);
      i += 1;
      continue;
    }

    if (arg === "--format") {
      const value = raw[i + 1];
      if (value !== "pretty" && value !== "json") {
        throw new Error("--format must be 'pretty' or 'json'");
      }
      args.format = value;
      i += 1;
      continue;
    }

    throw new Error(`Unknown argument: ${arg}`);
  }

  return args;
}
