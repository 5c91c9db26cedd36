/**
 * CMS Problem List Configuration
 *
 * Environment-driven settings for the note pipeline and the command line.
 * Values that fail validation fall back to their defaults; `validateConfig`
 * reports what was rejected.
 */
import { config as loadDotenv } from "dotenv";
import { z } from "zod";

export interface CmsConfig {
  maxSupportingItems: number;
  icd10TablePath: string;
  fuzzyScoreCutoff: number;
}

export const DEFAULT_CMS_CONFIG: Readonly<CmsConfig> = Object.freeze({
  maxSupportingItems: 4,
  icd10TablePath: "icd10cm_codes.csv",
  fuzzyScoreCutoff: 80,
});

const positiveInt = z.coerce.number().int().min(1);
const nonEmpty = z.string().min(1);
const score = z.coerce.number().min(0).max(100);

export class CmsConfigManager {
  private static config: CmsConfig | null = null;
  private static rejected: string[] = [];

  /**
   * Loads `.env.local` (if present) into process.env. Existing variables win.
   */
  static loadEnvironment(envPath: string = ".env.local"): void {
    loadDotenv({ path: envPath });
    this.resetConfig();
  }

  static getConfig(): CmsConfig {
    if (!this.config) {
      this.config = this.loadConfig();
    }
    return this.config;
  }

  /**
   * Names of variables that were set but rejected.
   */
  static validateConfig(): string[] {
    this.getConfig();
    return [...this.rejected];
  }

  static resetConfig(): void {
    this.config = null;
    this.rejected = [];
  }

  private static loadConfig(): CmsConfig {
    this.rejected = [];
    return {
      maxSupportingItems: this.read("CMS_MAX_SUPPORTING_ITEMS", positiveInt, DEFAULT_CMS_CONFIG.maxSupportingItems),
      icd10TablePath: this.read("CMS_ICD10_TABLE_PATH", nonEmpty, DEFAULT_CMS_CONFIG.icd10TablePath),
      fuzzyScoreCutoff: this.read("CMS_FUZZY_SCORE_CUTOFF", score, DEFAULT_CMS_CONFIG.fuzzyScoreCutoff),
    };
  }

  private static read<T>(key: string, schema: z.ZodType<T>, defaultValue: T): T {
    const raw = process.env[key];
    if (raw === undefined || raw === "") {
      return defaultValue;
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      this.rejected.push(`${key}: ${parsed.error.issues[0]?.message ?? "invalid value"}`);
      return defaultValue;
    }
    return parsed.data;
  }
}
