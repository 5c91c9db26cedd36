/**
 * Priority Classifier
 *
 * One algorithm for every axis: walk the registry's priority list in order
 * and return the first label that has any rule matching anywhere in the
 * lower-cased text. Specificity plays no part; only declared order does.
 */
import { InvalidInputError } from "./errors";
import { AXIS_REGISTRIES } from "./registries";
import {
  AXIS_NAMES,
  AxisClassification,
  AxisRegistry,
  ClassificationExplanation,
  Label,
  PatternRule,
  UNSPECIFIED,
} from "./types";

function assertText(text: unknown, operation: string): asserts text is string {
  if (typeof text !== "string") {
    throw new InvalidInputError(`${operation} expects text, received ${text === null ? "null" : typeof text}`);
  }
}

function findFirstMatch(
  text: string,
  registry: AxisRegistry,
): { rule: PatternRule; match: RegExpExecArray } | null {
  const normalized = text.toLowerCase();

  for (const entry of registry.entries) {
    for (const rule of entry.rules) {
      const match = rule.regex.exec(normalized);
      if (match) {
        return { rule, match };
      }
    }
  }

  return null;
}

/**
 * Returns the highest-priority label whose patterns match, or `unspecified`.
 */
export function classify(text: string, registry: AxisRegistry): Label {
  assertText(text, "classify");
  return findFirstMatch(text, registry)?.rule.label ?? UNSPECIFIED;
}

/**
 * Same decision as `classify`, plus the rule and text that produced it.
 */
export function explainClassification(
  text: string,
  registry: AxisRegistry,
): ClassificationExplanation {
  assertText(text, "explainClassification");
  const hit = findFirstMatch(text, registry);

  if (!hit) {
    return { axis: registry.axis, label: UNSPECIFIED };
  }

  return {
    axis: registry.axis,
    label: hit.rule.label,
    matchedRule: hit.rule.source,
    matchedText: hit.match[0],
  };
}

/**
 * Classifies one text on all eight axes.
 */
export function classifyAll(
  text: string,
  registries: Readonly<Record<keyof AxisClassification, AxisRegistry>> = AXIS_REGISTRIES,
): AxisClassification {
  assertText(text, "classifyAll");

  return {
    modifier: classify(text, registries.modifier),
    complication: classify(text, registries.complication),
    etiology: classify(text, registries.etiology),
    stage: classify(text, registries.stage),
    laterality: classify(text, registries.laterality),
    location: classify(text, registries.location),
    temporal: classify(text, registries.temporal),
    context: classify(text, registries.context),
  };
}

/**
 * Per-axis explanations, in axis order.
 */
export function explainAll(
  text: string,
  registries: Readonly<Record<keyof AxisClassification, AxisRegistry>> = AXIS_REGISTRIES,
): ClassificationExplanation[] {
  assertText(text, "explainAll");
  return AXIS_NAMES.map((axis) => explainClassification(text, registries[axis]));
}
