/**
 * Note Analyzer
 *
 * End-to-end pass over a free-text note: expand abbreviations, find the
 * diagnoses it names, classify the note on every axis, pull supporting data
 * and render the problem list. Every detected diagnosis shares the note-level
 * classification and supporting data.
 */
import { DEFAULT_MAX_SUPPORTING_ITEMS, extractSupportingData } from "../cms/supporting-data-extractor";
import { describeError } from "../cms/errors";
import { classifyAll } from "../cms/priority-classifier";
import { buildProblemList, ProblemListResult } from "../cms/problem-list-builder";
import { AxisClassification, DiagnosisRecord, UNSPECIFIED } from "../cms/types";
import type { CmsLogger } from "../logging/logging-types";
import { expandAbbreviations } from "./abbreviation-expander";
import { detectDiagnoses } from "./diagnosis-detector";
import { MAPPING_UNAVAILABLE, TerminologyLookupService } from "./terminology-lookup-service";

export interface NoteAnalysisOptions {
  maxSupportingItems?: number;
  terminology?: TerminologyLookupService;
  logger?: CmsLogger;
}

export interface CodedDiagnosis {
  diagnosis: string;
  description: string;
}

export interface NoteAnalysis {
  expandedText: string;
  diagnoses: string[];
  classification: AxisClassification;
  supportingData: string;
  records: DiagnosisRecord[];
  problemList: ProblemListResult;
  coded: CodedDiagnosis[];
}

async function codeDiagnoses(
  diagnoses: readonly string[],
  modifier: string,
  terminology: TerminologyLookupService,
  logger?: CmsLogger,
): Promise<CodedDiagnosis[]> {
  const coded: CodedDiagnosis[] = [];
  for (const diagnosis of diagnoses) {
    try {
      coded.push({ diagnosis, description: await terminology.lookup(modifier, diagnosis) });
    } catch (error) {
      logger?.logWarn("analyzeNote", `Terminology lookup failed for ${diagnosis}`, {
        error: describeError(error),
      });
      coded.push({ diagnosis, description: MAPPING_UNAVAILABLE });
    }
  }
  return coded;
}

export async function analyzeNote(
  noteText: string,
  options: NoteAnalysisOptions = {},
): Promise<NoteAnalysis> {
  const { maxSupportingItems = DEFAULT_MAX_SUPPORTING_ITEMS, terminology, logger } = options;

  const expandedText = expandAbbreviations(noteText);
  const diagnoses = detectDiagnoses(expandedText);
  const classification = classifyAll(expandedText);
  const supportingData = extractSupportingData(noteText, maxSupportingItems);

  logger?.logDebug("analyzeNote", "Note classified", {
    diagnoses,
    classification,
  });

  const records: DiagnosisRecord[] = diagnoses.map((diagnosis) => ({
    diagnosis,
    ...classification,
    supportingData,
  }));

  const problemList = buildProblemList(records, { logger });

  const modifier = classification.modifier === UNSPECIFIED ? "" : classification.modifier;
  const coded = terminology ? await codeDiagnoses(diagnoses, modifier, terminology, logger) : [];

  logger?.logInfo("analyzeNote", "Note analyzed", {
    diagnosisCount: diagnoses.length,
    invalidCount: problemList.invalidCount,
    coded: coded.length,
  });

  return {
    expandedText,
    diagnoses,
    classification,
    supportingData,
    records,
    problemList,
    coded,
  };
}
