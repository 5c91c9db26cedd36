/**
 * Shared types for the CMS problem-list core.
 */

/** Reserved label meaning "no pattern matched" on any axis. */
export const UNSPECIFIED = "unspecified";

export type Label = string;

export const AXIS_NAMES = [
  "modifier",
  "complication",
  "etiology",
  "stage",
  "laterality",
  "location",
  "temporal",
  "context",
] as const;

export type AxisName = (typeof AXIS_NAMES)[number];

/**
 * A compiled pattern bound to one label of one axis.
 */
export interface PatternRule {
  /** Label this rule votes for */
  label: Label;

  /** Regular expression source exactly as declared in the table */
  source: string;

  /** Compiled form; matched against lower-cased text */
  regex: RegExp;
}

/**
 * One entry of the explicit priority list: a label and all of its rules.
 */
export interface PriorityEntry {
  label: Label;
  rules: readonly PatternRule[];
}

/**
 * Immutable classification table for a single axis.
 * `entries` is evaluated linearly; the first entry with a matching rule wins.
 */
export interface AxisRegistry {
  axis: AxisName;
  description: string;
  priority: readonly Label[];
  entries: readonly PriorityEntry[];
}

export type AxisClassification = Record<AxisName, Label>;

/**
 * Classification outcome with the rule that decided it.
 */
export interface ClassificationExplanation {
  axis: AxisName;
  label: Label;
  /** Source of the first rule that matched, absent for `unspecified` */
  matchedRule?: string;
  /** Text matched by that rule */
  matchedText?: string;
}

/**
 * Per-diagnosis input to the phrase assembler.
 * Axis values default to `unspecified`; supporting data defaults to "".
 */
export interface DiagnosisRecord {
  diagnosis: string;
  modifier?: string;
  complication?: string;
  stage?: string;
  temporal?: string;
  laterality?: string;
  location?: string;
  etiology?: string;
  context?: string;
  severity?: string;
  supportingData?: string;
}

export type PhraseComponents = Omit<DiagnosisRecord, "diagnosis">;

export type SupportingDataGroup = "labs" | "vitals" | "imaging" | "treatment";

export interface SupportingFinding {
  group: SupportingDataGroup;
  category: string;
  fragment: string;
}
