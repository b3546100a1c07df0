import { setDebugMode } from "./log";
import { createRuleRegistry, RuleRegistry } from "./registry";

export const DEFAULT_MAX_BODY_BYTES = 5_000_000;

export interface ServiceConfig {
  disableRules: string[];
  maxBodyBytes: number;
  debug: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const config: ServiceConfig = {
    disableRules: parseList(env.STMTGUARD_DISABLE_RULES),
    maxBodyBytes: parseBodyLimit(env.STMTGUARD_MAX_BODY_BYTES),
    debug: env.STMTGUARD_DEBUG === "1" || env.STMTGUARD_DEBUG === "true",
  };

  setDebugMode(config.debug);
  return config;
}

export function registryFromConfig(config: ServiceConfig): RuleRegistry {
  return createRuleRegistry({ disableRules: config.disableRules });
}

function parseList(raw: string | undefined): string[] {
  if (!raw) {
    return [];
  }

  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseBodyLimit(raw: string | undefined): number {
  if (!raw) {
    return DEFAULT_MAX_BODY_BYTES;
  }

  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(
      `STMTGUARD_MAX_BODY_BYTES must be a positive integer, got '${raw}'`,
    );
  }

  return value;
}
