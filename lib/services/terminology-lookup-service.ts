/**
 * Coded Terminology Lookup
 *
 * Maps an assembled diagnosis back to an ICD-10-CM description. This sits
 * downstream of classification: it never changes a phrase, it only annotates
 * it. A missing code table is not fatal; lookups then report the mapping as
 * unavailable.
 */
import * as fs from "fs";
import Papa from "papaparse";
import { distance } from "fastest-levenshtein";
import { z } from "zod";
import { describeError, TerminologyLookupError } from "../cms/errors";
import type { CmsLogger } from "../logging/logging-types";

export const MAPPING_UNAVAILABLE = "⚠️ ICD-10 mapping unavailable";
export const UNMAPPED_SUFFIX = " — ⚠️ unmapped";

export interface TerminologyLookupService {
  lookup(modifier: string, diagnosisText: string): Promise<string>;
}

export interface TerminologyEntry {
  code: string;
  shortDescription: string;
  longDescription: string;
}

export interface TerminologyMatch {
  entry: TerminologyEntry;
  score: number;
}

export interface IcdTerminologyServiceOptions {
  tablePath: string;
  scoreCutoff: number;
  logger?: CmsLogger;
}

const icdRowSchema = z.object({
  Code: z.string().min(1),
  ShortDesc: z.string().default(""),
  LongDesc: z.string().min(1),
});

function normalize(value: string): string {
  return value.toLowerCase().replace(/\s+/g, " ").trim();
}

function ratio(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  return longest === 0 ? 100 : 100 * (1 - distance(a, b) / longest);
}

function sortTokens(value: string): string {
  return value.split(/[^a-z0-9]+/).filter(Boolean).sort().join(" ");
}

/**
 * 0-100 similarity: the better of plain and token-sorted edit similarity,
 * compared case-insensitively.
 */
export function similarityScore(a: string, b: string): number {
  const left = normalize(a);
  const right = normalize(b);
  return Math.max(ratio(left, right), ratio(sortTokens(left), sortTokens(right)));
}

/**
 * Parses a code table with `Code`, `ShortDesc` and `LongDesc` columns.
 * Rows missing a code or long description are dropped.
 */
export function parseTerminologyCsv(content: string, logger?: CmsLogger): TerminologyEntry[] {
  const result = Papa.parse<Record<string, string>>(content, {
    header: true,
    skipEmptyLines: true,
  });

  if (result.errors.length > 0) {
    logger?.logWarn("parseTerminologyCsv", "CSV parsing errors in code table", {
      errors: result.errors.map((error) => `${error.code} at row ${error.row ?? "?"}: ${error.message}`),
    });
  }

  const entries: TerminologyEntry[] = [];
  for (const row of result.data) {
    const parsed = icdRowSchema.safeParse(row);
    if (parsed.success) {
      entries.push({
        code: parsed.data.Code.trim(),
        shortDescription: parsed.data.ShortDesc.trim(),
        longDescription: parsed.data.LongDesc.trim(),
      });
    }
  }
  return entries;
}

export class IcdTerminologyServiceImpl implements TerminologyLookupService {
  private entries: TerminologyEntry[] | null = null;

  constructor(private options: IcdTerminologyServiceOptions) {}

  /**
   * Builds a service over an in-memory table (no file access).
   */
  static fromEntries(
    entries: TerminologyEntry[],
    scoreCutoff: number,
    logger?: CmsLogger,
  ): IcdTerminologyServiceImpl {
    const service = new IcdTerminologyServiceImpl({ tablePath: "", scoreCutoff, logger });
    service.entries = [...entries];
    return service;
  }

  /**
   * Reads the code table once. Returns the number of usable rows; a missing
   * file yields zero rows, other read failures raise `TerminologyLookupError`.
   */
  async load(): Promise<number> {
    if (this.entries) {
      return this.entries.length;
    }

    const { tablePath, logger } = this.options;
    let entries: TerminologyEntry[];
    try {
      const content = await fs.promises.readFile(tablePath, "utf8");
      entries = parseTerminologyCsv(content, logger);
      logger?.logInfo("IcdTerminologyService.load", "Code table loaded", {
        tablePath,
        entries: entries.length,
      });
    } catch (error) {
      if (!isMissingFile(error)) {
        throw new TerminologyLookupError(`Failed to read code table: ${describeError(error)}`, {
          tablePath,
        });
      }
      logger?.logWarn("IcdTerminologyService.load", "Code table not found, mapping disabled", {
        tablePath,
      });
      entries = [];
    }

    this.entries = entries;
    return entries.length;
  }

  isAvailable(): boolean {
    return this.entries !== null && this.entries.length > 0;
  }

  /**
   * Highest-scoring entry at or above the cutoff; the first one wins ties.
   */
  findBestMatch(term: string): TerminologyMatch | null {
    let best: TerminologyMatch | null = null;
    for (const entry of this.entries ?? []) {
      const score = similarityScore(term, entry.longDescription);
      if (score >= this.options.scoreCutoff && (!best || score > best.score)) {
        best = { entry, score };
      }
    }
    return best;
  }

  async lookup(modifier: string, diagnosisText: string): Promise<string> {
    await this.load();

    if (!this.isAvailable()) {
      return MAPPING_UNAVAILABLE;
    }

    const term = `${modifier} ${diagnosisText}`.trim();
    const match = this.findBestMatch(term);
    if (!match) {
      return `${term}${UNMAPPED_SUFFIX}`;
    }
    return `${match.entry.longDescription} (${match.entry.code})`;
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
