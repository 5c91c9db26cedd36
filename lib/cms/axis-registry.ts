/**
 * Axis Registry
 *
 * Turns a declared pattern table into an immutable, explicitly ordered
 * registry. Tables are validated once at load time; a table that breaks the
 * priority/rules invariant never reaches the classifier.
 */
import { z } from "zod";
import { RegistryDefinitionError } from "./errors";
import { AXIS_NAMES, AxisRegistry, PatternRule, PriorityEntry, UNSPECIFIED } from "./types";

export const axisTableSchema = z.object({
  axis: z.enum(AXIS_NAMES),
  description: z.string(),
  priority: z.array(z.string().min(1)).min(1),
  rules: z.record(z.string(), z.array(z.string().min(1)).min(1)),
});

export type AxisTable = z.infer<typeof axisTableSchema>;

/**
 * Compiles a pattern source exactly as declared. No flags are added: callers
 * lower-case the text, so the table's own casing decides what can match.
 */
export function compilePattern(source: string, flags?: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    throw new RegistryDefinitionError(`Invalid pattern "${source}"`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Checks that every rule label appears exactly once in the priority list and
 * that the priority list names no label without rules.
 */
export function validateAxisTable(table: AxisTable): string[] {
  const errors: string[] = [];
  const seen = new Set<string>();

  for (const label of table.priority) {
    if (seen.has(label)) {
      errors.push(`Label "${label}" appears more than once in priority`);
    }
    seen.add(label);
    if (!Object.prototype.hasOwnProperty.call(table.rules, label)) {
      errors.push(`Label "${label}" has no rules`);
    }
  }

  for (const label of Object.keys(table.rules)) {
    if (!seen.has(label)) {
      errors.push(`Label "${label}" is missing from priority`);
    }
  }

  return errors;
}

/**
 * Builds a frozen registry from raw table data (usually parsed JSON).
 */
export function defineAxisRegistry(raw: unknown): AxisRegistry {
  const parsed = axisTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RegistryDefinitionError("Malformed axis table", {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }

  const table = parsed.data;
  const errors = validateAxisTable(table);
  if (errors.length > 0) {
    throw new RegistryDefinitionError(`Axis "${table.axis}" violates registry invariants`, {
      errors,
    });
  }

  const entries: PriorityEntry[] = table.priority.map((label) => {
    const rules: PatternRule[] = table.rules[label].map((source) => ({
      label,
      source,
      regex: compilePattern(source),
    }));
    return Object.freeze({ label, rules: Object.freeze(rules) });
  });

  return Object.freeze({
    axis: table.axis,
    description: table.description,
    priority: Object.freeze([...table.priority]),
    entries: Object.freeze(entries),
  });
}

/**
 * Every label an axis can produce, sentinel included.
 */
export function labelSet(registry: AxisRegistry): ReadonlySet<string> {
  return new Set([...registry.priority, UNSPECIFIED]);
}
