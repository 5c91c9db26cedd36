import { ABBREVIATION_MAP } from "../constants/clinical-terms";
import { escapeRegExp } from "../utils/text-utils";

/**
 * Replaces whole-word abbreviations with their expansions, in map order.
 * Matching is case-sensitive, so "htn" is left alone while "HTN" expands.
 */
export function expandAbbreviations(
  text: string,
  abbreviations: Readonly<Record<string, string>> = ABBREVIATION_MAP,
): string {
  let expanded = text;
  for (const [abbreviation, expansion] of Object.entries(abbreviations)) {
    expanded = expanded.replace(
      new RegExp(`\\b${escapeRegExp(abbreviation)}\\b`, "g"),
      () => expansion,
    );
  }
  return expanded;
}
