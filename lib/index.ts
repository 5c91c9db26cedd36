/**
 * CMS Problem List - Main Index
 *
 * Public entry point: axis registries, the classifier, supporting-data
 * extraction, phrase assembly and the problem list builder.
 */

// ============================================================================
// CORE TYPES AND ERRORS
// ============================================================================

export * from "./cms/types";
export * from "./cms/errors";

// ============================================================================
// AXIS REGISTRIES AND CLASSIFICATION
// ============================================================================

export { defineAxisRegistry, validateAxisTable, compilePattern, labelSet } from "./cms/axis-registry";
export * from "./cms/registries";
export { classify, classifyAll, explainClassification, explainAll } from "./cms/priority-classifier";

// ============================================================================
// SUPPORTING DATA, PHRASES AND PROBLEM LISTS
// ============================================================================

export {
  extractSupportingData,
  collectSupportingFindings,
  selectSupportingFragments,
  NO_SUPPORTING_DATA,
  DEFAULT_MAX_SUPPORTING_ITEMS,
} from "./cms/supporting-data-extractor";
export { assembleCmsPhrase, SUPPORTING_DATA_SEPARATOR } from "./cms/phrase-assembler";
export * from "./cms/diagnosis-record";
export * from "./cms/problem-list-builder";

// ============================================================================
// NOTE PIPELINE, CONFIGURATION AND LOGGING
// ============================================================================

export * from "./services";
export { CmsConfigManager, DEFAULT_CMS_CONFIG, type CmsConfig } from "./config/cms-config";
export { WorkflowLogger, type WorkflowLoggerConfig } from "./logging/logging";
export { LogLevel, type CmsLogger } from "./logging/logging-types";
