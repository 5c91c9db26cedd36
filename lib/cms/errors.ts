/**
 * CMS Processing Errors
 *
 * Error kinds raised by the classification, assembly and lookup layers.
 * A missing match is never an error: it is the `unspecified` sentinel.
 */

export const CMS_ERROR_CODES = {
  INVALID_INPUT: "INVALID_INPUT",
  INVALID_REGISTRY: "INVALID_REGISTRY",
  TERMINOLOGY_UNAVAILABLE: "TERMINOLOGY_UNAVAILABLE",
  CONFIG_INVALID: "CONFIG_INVALID",
} as const;

export type CmsErrorCode = (typeof CMS_ERROR_CODES)[keyof typeof CMS_ERROR_CODES];

export enum CmsErrorSeverity { LOW, MEDIUM, HIGH, CRITICAL }

export class CmsProcessingError extends Error {
  public readonly code: CmsErrorCode;
  public readonly severity: CmsErrorSeverity;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    code: CmsErrorCode,
    message: string,
    severity: CmsErrorSeverity,
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "CmsProcessingError";
    this.code = code;
    this.severity = severity;
    this.timestamp = new Date();
    this.context = context;
  }
}

/**
 * Raised for values that are not text where text is required
 * (a null note, a record without a base diagnosis, ...).
 */
export class InvalidInputError extends CmsProcessingError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(CMS_ERROR_CODES.INVALID_INPUT, message, CmsErrorSeverity.MEDIUM, context);
    this.name = "InvalidInputError";
  }
}

/**
 * Raised at load time when a pattern table breaks the registry invariants.
 */
export class RegistryDefinitionError extends CmsProcessingError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(CMS_ERROR_CODES.INVALID_REGISTRY, message, CmsErrorSeverity.CRITICAL, context);
    this.name = "RegistryDefinitionError";
  }
}

export class TerminologyLookupError extends CmsProcessingError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(CMS_ERROR_CODES.TERMINOLOGY_UNAVAILABLE, message, CmsErrorSeverity.LOW, context);
    this.name = "TerminologyLookupError";
  }
}

/**
 * Normalizes anything thrown into a message string.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
