/**
 * Supporting-Data Extractor
 *
 * Collects every objective fragment (labs, vitals, imaging, treatment
 * markers) found in a note. Unlike the axis classifiers nothing here is
 * exclusive or prioritized: all matches of all patterns are kept, then
 * rendered in sorted order so output does not depend on note layout.
 *
 * A pattern whose capture group sat out of the match still counts: it
 * contributes an empty fragment, which sorts first and shows up as a
 * leading ", " in the rendered list.
 */
import { z } from "zod";
import { compilePattern } from "./axis-registry";
import { RegistryDefinitionError } from "./errors";
import { SupportingDataGroup, SupportingFinding } from "./types";

import supportingDataPatterns from "./data/supporting-data-patterns.json";

export const NO_SUPPORTING_DATA = "⚠️ No supporting data";
export const DEFAULT_MAX_SUPPORTING_ITEMS = 4;

const categoryPatternsSchema = z.record(z.string(), z.array(z.string().min(1)));

const supportingPatternsSchema = z.object({
  labs: categoryPatternsSchema,
  vitals: categoryPatternsSchema,
  imaging: categoryPatternsSchema,
  treatment: categoryPatternsSchema,
});

export interface SupportingPattern {
  group: SupportingDataGroup;
  category: string;
  source: string;
  regex: RegExp;
}

// Scan order: labs, vitals, imaging, treatment markers
const GROUP_ORDER: readonly SupportingDataGroup[] = ["labs", "vitals", "imaging", "treatment"];

function compileSupportingPatterns(raw: unknown): readonly SupportingPattern[] {
  const parsed = supportingPatternsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RegistryDefinitionError("Malformed supporting-data pattern table", {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }

  const patterns: SupportingPattern[] = [];
  for (const group of GROUP_ORDER) {
    for (const [category, sources] of Object.entries(parsed.data[group])) {
      for (const source of sources) {
        patterns.push({ group, category, source, regex: compilePattern(source, "g") });
      }
    }
  }
  return Object.freeze(patterns);
}

export const SUPPORTING_DATA_PATTERNS = compileSupportingPatterns(supportingDataPatterns);

/**
 * A match contributes its first capture group when the pattern declares
 * groups (an unmatched group counts as ""), otherwise the whole match.
 */
function fragmentOf(match: RegExpMatchArray): string {
  const value = match.length > 1 ? match[1] ?? "" : match[0];
  return value.trim();
}

/**
 * Every fragment with the group and category that produced it, in
 * pattern-table order. Duplicates and empty fragments are kept.
 */
export function collectSupportingFindings(
  text: string,
  patterns: readonly SupportingPattern[] = SUPPORTING_DATA_PATTERNS,
): SupportingFinding[] {
  if (typeof text !== "string") {
    return [];
  }

  const normalized = text.toLowerCase();
  const findings: SupportingFinding[] = [];

  for (const pattern of patterns) {
    // matchAll works on a copy of the regex, the shared instance keeps lastIndex 0
    for (const match of normalized.matchAll(pattern.regex)) {
      findings.push({ group: pattern.group, category: pattern.category, fragment: fragmentOf(match) });
    }
  }

  return findings;
}

function uniqueSortedFragments(findings: readonly SupportingFinding[]): string[] {
  return Array.from(new Set(findings.map((finding) => finding.fragment))).sort();
}

/**
 * Deduplicated, code-unit sorted fragments capped at `maxItems`.
 */
export function selectSupportingFragments(
  findings: readonly SupportingFinding[],
  maxItems: number = DEFAULT_MAX_SUPPORTING_ITEMS,
): string[] {
  return uniqueSortedFragments(findings).slice(0, Math.max(0, maxItems));
}

/**
 * Comma-joined supporting data for a note. The sentinel is reserved for
 * notes without any finding; a cap of 0 on a note with findings gives "".
 */
export function extractSupportingData(
  text: string,
  maxItems: number = DEFAULT_MAX_SUPPORTING_ITEMS,
): string {
  const fragments = uniqueSortedFragments(collectSupportingFindings(text));
  if (fragments.length === 0) {
    return NO_SUPPORTING_DATA;
  }
  return fragments.slice(0, Math.max(0, maxItems)).join(", ");
}
