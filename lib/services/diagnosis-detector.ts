import { KNOWN_DIAGNOSES } from "../constants/clinical-terms";
import { escapeRegExp } from "../utils/text-utils";

const DIAGNOSIS_PATTERNS = Object.freeze(
  KNOWN_DIAGNOSES.map((name) => ({
    name,
    regex: new RegExp(`\\b${escapeRegExp(name)}\\b`, "i"),
  })),
);

/**
 * Known diagnosis names present in the text (whole word, any case),
 * in table order and without duplicates.
 */
export function detectDiagnoses(text: string): string[] {
  return DIAGNOSIS_PATTERNS.filter(({ regex }) => regex.test(text)).map(({ name }) => name);
}
