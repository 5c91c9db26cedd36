/**
 * Phrase Assembler
 *
 * Composes one CMS-style diagnostic phrase from classified components.
 * Element order is fixed:
 *   1. temporal status, or the modifier when no temporal status is present
 *   2. base diagnosis
 *   3. stage, then severity (skipped if the exact string is already present)
 *   4. "with <complication>"
 *   5. "due to <etiology>"
 *   6. laterality and location as one unit
 *   7. "(<context>)"
 * followed by " — <supporting data>" when supporting data is given.
 */
import { InvalidInputError } from "./errors";
import { PhraseComponents, UNSPECIFIED } from "./types";

export const SUPPORTING_DATA_SEPARATOR = " — ";

function present(value: string | undefined): string | null {
  return !value || value === UNSPECIFIED ? null : value;
}

function capitalizeFirst(phrase: string): string {
  return phrase.length > 0 ? phrase[0].toUpperCase() + phrase.slice(1) : phrase;
}

/**
 * Builds the canonical phrase for one diagnosis. Pure: same input, same output.
 */
export function assembleCmsPhrase(
  baseDiagnosis: string,
  components: PhraseComponents = {},
): string {
  if (typeof baseDiagnosis !== "string") {
    throw new InvalidInputError("Base diagnosis must be a string", {
      received: baseDiagnosis === null ? "null" : typeof baseDiagnosis,
    });
  }

  const {
    modifier,
    complication,
    stage,
    temporal,
    laterality,
    location,
    etiology,
    context,
    severity,
    supportingData,
  } = components;

  const parts: string[] = [];

  const prefix = present(temporal) ?? present(modifier);
  if (prefix) {
    parts.push(prefix);
  }

  parts.push(baseDiagnosis.trim());

  for (const piece of [present(stage), present(severity)]) {
    if (piece && !parts.includes(piece)) {
      parts.push(piece);
    }
  }

  const complicationPart = present(complication);
  if (complicationPart) {
    parts.push(`with ${complicationPart}`);
  }

  const etiologyPart = present(etiology);
  if (etiologyPart && etiologyPart !== "none" && !etiologyPart.startsWith("with")) {
    parts.push(`due to ${etiologyPart}`);
  }

  const spatial = [present(laterality), present(location)].filter(
    (value): value is string => value !== null,
  );
  if (spatial.length > 0) {
    parts.push(spatial.join(" "));
  }

  const contextPart = present(context);
  if (contextPart && contextPart !== "none") {
    parts.push(`(${contextPart})`);
  }

  let phrase = capitalizeFirst(parts.filter((part) => part.length > 0).join(" ").trim());

  if (supportingData) {
    phrase += `${SUPPORTING_DATA_SEPARATOR}${supportingData}`;
  }

  return phrase;
}
