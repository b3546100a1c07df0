import { rules } from "./rules";
import { Rule } from "./types";

export interface RuleRegistry {
  readonly rules: readonly Rule[];
}

export interface RegistryOptions {
  disableRules?: string[];
}

export function createRuleRegistry(options?: RegistryOptions): RuleRegistry {
  const disabled = new Set(options?.disableRules ?? []);

  for (const id of disabled) {
    if (!rules.some((rule) => rule.id === id)) {
      throw new Error(
        `Unknown rule '${id}'. Available rules: ${rules.map((rule) => rule.id).join(", ")}`,
      );
    }
  }

  return Object.freeze({
    rules: Object.freeze(rules.filter((rule) => !disabled.has(rule.id))),
  });
}

export const DEFAULT_REGISTRY: RuleRegistry = createRuleRegistry();

export function listRules(registry: RuleRegistry = DEFAULT_REGISTRY): string[] {
  return registry.rules.map((rule) => rule.id);
}
