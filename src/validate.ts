import { ApiError } from "./errors";
import { Unit } from "./types";

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireString(value: JsonObject, key: string, path: string): string {
  const field = value[key];
  if (typeof field !== "string") {
    throw new ApiError(422, `${path}.${key} must be a string`);
  }
  return field;
}

function optionalString(
  value: JsonObject,
  key: string,
  path: string,
  fallback: string | null,
): string | null {
  const field = value[key];
  if (field === undefined) {
    return fallback;
  }
  if (field !== null && typeof field !== "string") {
    throw new ApiError(422, `${path}.${key} must be a string or null`);
  }
  return field;
}

function optionalInteger(value: JsonObject, key: string, path: string): number {
  const field = value[key];
  if (field === undefined) {
    return 0;
  }
  if (typeof field !== "number" || !Number.isInteger(field)) {
    throw new ApiError(422, `${path}.${key} must be an integer`);
  }
  return field;
}

const FINDING_STRING_FIELDS = [
  "prog_name",
  "incl_name",
  "types",
  "blockname",
  "issues_type",
  "severity",
  "message",
  "suggestion",
  "snippet",
] as const;

const FINDING_INTEGER_FIELDS = ["starting_line", "ending_line"] as const;

function checkFindings(value: JsonObject, path: string): void {
  const field = value.findings;
  if (field === undefined || field === null) {
    return;
  }
  if (!Array.isArray(field)) {
    throw new ApiError(422, `${path}.findings must be an array or null`);
  }

  field.forEach((item: unknown, index) => {
    const itemPath = `${path}.findings[${index}]`;
    if (!isObject(item)) {
      throw new ApiError(422, `${itemPath} must be a JSON object`);
    }

    // every finding field is optional and nullable
    for (const key of FINDING_STRING_FIELDS) {
      const entry = item[key];
      if (entry !== undefined && entry !== null && typeof entry !== "string") {
        throw new ApiError(422, `${itemPath}.${key} must be a string or null`);
      }
    }
    for (const key of FINDING_INTEGER_FIELDS) {
      const entry = item[key];
      if (
        entry !== undefined &&
        entry !== null &&
        (typeof entry !== "number" || !Number.isInteger(entry))
      ) {
        throw new ApiError(422, `${itemPath}.${key} must be an integer or null`);
      }
    }
  });
}

/**
 * Checks one unit payload and fills in the optional fields. Incoming
 * `findings` are shape-checked, then dropped; scanning recomputes them.
 */
export function validateUnit(raw: unknown, path = "unit"): Unit {
  if (!isObject(raw)) {
    throw new ApiError(422, `${path} must be a JSON object`);
  }

  checkFindings(raw, path);

  return {
    pgm_name: requireString(raw, "pgm_name", path),
    inc_name: requireString(raw, "inc_name", path),
    type: requireString(raw, "type", path),
    name: optionalString(raw, "name", path, ""),
    class_implementation: optionalString(raw, "class_implementation", path, null),
    start_line: optionalInteger(raw, "start_line", path),
    end_line: optionalInteger(raw, "end_line", path),
    code: optionalString(raw, "code", path, ""),
    findings: null,
  };
}

export function validateUnits(raw: unknown): Unit[] {
  if (!Array.isArray(raw)) {
    throw new ApiError(422, "Body must be a JSON array of units");
  }

  return raw.map((item: unknown, index) => validateUnit(item, `units[${index}]`));
}
