/**
 * Problem List Builder
 *
 * Renders an ordered sequence of diagnosis records as a numbered problem
 * list. Records are never reordered, merged or filtered; a malformed record
 * yields an error line at its own position and the rest still render.
 */
import type { CmsLogger } from "../logging/logging-types";
import { safeParseDiagnosisRecord } from "./diagnosis-record";
import { describeError, InvalidInputError } from "./errors";
import { assembleCmsPhrase } from "./phrase-assembler";

export const PROBLEM_LIST_HEADING = "# CMS-Ready Problem List";
export const INVALID_RECORD_MARKER = "⚠️ Invalid diagnosis record";

export type ProblemListEntry =
  | { index: number; status: "ok"; phrase: string }
  | { index: number; status: "invalid"; error: InvalidInputError };

export interface ProblemListResult {
  text: string;
  entries: ProblemListEntry[];
  invalidCount: number;
}

export interface ProblemListOptions {
  heading?: string;
  logger?: CmsLogger;
}

function renderEntry(entry: ProblemListEntry): string {
  return entry.status === "ok"
    ? `${entry.index}. ${entry.phrase}`
    : `${entry.index}. ${INVALID_RECORD_MARKER}: ${entry.error.message}`;
}

function buildEntry(record: unknown, index: number): ProblemListEntry {
  const parsed = safeParseDiagnosisRecord(record);
  if (!parsed.success) {
    return { index, status: "invalid", error: parsed.error };
  }

  const { diagnosis, ...components } = parsed.record;
  try {
    return { index, status: "ok", phrase: assembleCmsPhrase(diagnosis, components) };
  } catch (error) {
    const invalid =
      error instanceof InvalidInputError ? error : new InvalidInputError(describeError(error));
    return { index, status: "invalid", error: invalid };
  }
}

/**
 * Builds the list and reports each record's outcome.
 */
export function buildProblemList(
  records: readonly unknown[],
  options: ProblemListOptions = {},
): ProblemListResult {
  const { heading = PROBLEM_LIST_HEADING, logger } = options;

  const entries = records.map((record, position) => buildEntry(record, position + 1));

  let invalidCount = 0;
  for (const entry of entries) {
    if (entry.status === "invalid") {
      invalidCount++;
      logger?.logWarn("buildProblemList", `Diagnosis record ${entry.index} rejected`, {
        code: entry.error.code,
        reason: entry.error.message,
      });
    }
  }

  logger?.logDebug("buildProblemList", "Problem list assembled", {
    totalRecords: entries.length,
    invalidCount,
  });

  return {
    text: [heading, ...entries.map(renderEntry)].join("\n"),
    entries,
    invalidCount,
  };
}

/**
 * Heading line followed by one "<n>. <phrase>" line per record.
 */
export function buildCmsProblemList(
  records: readonly unknown[],
  options: ProblemListOptions = {},
): string {
  return buildProblemList(records, options).text;
}
