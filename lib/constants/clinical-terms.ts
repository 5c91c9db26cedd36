/**
 * Common problem-list abbreviations and their expansions.
 * Keys are matched whole-word and case-sensitively.
 */
export const ABBREVIATION_MAP: Readonly<Record<string, string>> = Object.freeze({
  DM2: "Type 2 diabetes mellitus",
  DM1: "Type 1 diabetes mellitus",
  HTN: "Hypertension",
  AKI: "Acute kidney injury",
  CKD: "Chronic kidney disease",
  CHF: "Congestive heart failure",
  COPD: "Chronic obstructive pulmonary disease",
  OSA: "Obstructive sleep apnea",
  CAD: "Coronary artery disease",
  AFib: "Atrial fibrillation",
});

/**
 * Diagnoses recognized in note text, in reporting order.
 */
export const KNOWN_DIAGNOSES: readonly string[] = Object.freeze([
  ...new Set([
    ...Object.values(ABBREVIATION_MAP),
    "Type 2 diabetes mellitus",
    "Type 1 diabetes mellitus",
    "Hypertension",
    "Acute kidney injury",
    "Chronic kidney disease",
    "Congestive heart failure",
    "Chronic obstructive pulmonary disease",
    "Pneumonia",
    "Anemia",
    "Depression",
    "Anxiety",
    "Coronary artery disease",
    "Atrial fibrillation",
  ]),
]);
