/**
 * Diagnosis record validation.
 *
 * Records usually arrive as parsed JSON, so they are checked here before they
 * reach the assembler. Unsupplied axes default to `unspecified`.
 * `supporting_data` is accepted as a spelling of `supportingData`; when both
 * are present the camelCase key wins.
 */
import { z } from "zod";
import { InvalidInputError } from "./errors";
import { UNSPECIFIED } from "./types";

const axisValue = z.string().default(UNSPECIFIED);

function aliasSupportingData(input: unknown): unknown {
  if (typeof input === "object" && input !== null && "supporting_data" in input && !("supportingData" in input)) {
    const { supporting_data: supportingData, ...rest } = input;
    return { ...rest, supportingData };
  }
  return input;
}

const diagnosisRecordObject = z.object({
  diagnosis: z.string(),
  modifier: axisValue,
  complication: axisValue,
  stage: axisValue,
  temporal: axisValue,
  laterality: axisValue,
  location: axisValue,
  etiology: axisValue,
  context: axisValue,
  severity: axisValue,
  supportingData: z.string().default(""),
});

export const diagnosisRecordSchema = z.preprocess(aliasSupportingData, diagnosisRecordObject);

export type NormalizedDiagnosisRecord = z.infer<typeof diagnosisRecordSchema>;

export type DiagnosisRecordParseResult =
  | { success: true; record: NormalizedDiagnosisRecord }
  | { success: false; error: InvalidInputError };

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "record"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validates one record without throwing.
 */
export function safeParseDiagnosisRecord(input: unknown): DiagnosisRecordParseResult {
  const parsed = diagnosisRecordSchema.safeParse(input);
  if (parsed.success) {
    return { success: true, record: parsed.data };
  }
  return {
    success: false,
    error: new InvalidInputError(formatIssues(parsed.error), { issues: parsed.error.issues }),
  };
}

/**
 * Validates one record, throwing `InvalidInputError` when it is malformed.
 */
export function parseDiagnosisRecord(input: unknown): NormalizedDiagnosisRecord {
  const result = safeParseDiagnosisRecord(input);
  if (!result.success) {
    throw result.error;
  }
  return result.record;
}
