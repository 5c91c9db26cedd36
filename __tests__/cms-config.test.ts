/**
 * Environment-driven configuration
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CmsConfigManager, DEFAULT_CMS_CONFIG } from '../lib/config/cms-config';
import { LogConfigManager } from '../lib/logging/log-config';
import { LogLevel } from '../lib/logging/logging-types';

const CMS_KEYS = [
  'CMS_MAX_SUPPORTING_ITEMS',
  'CMS_ICD10_TABLE_PATH',
  'CMS_FUZZY_SCORE_CUTOFF',
  'CMS_LOG_LEVEL',
  'CMS_LOG_DIRECTORY',
];

describe('CMS configuration', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of CMS_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    CmsConfigManager.resetConfig();
    LogConfigManager.resetConfig();
  });

  afterEach(() => {
    for (const key of CMS_KEYS) {
      if (saved[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = saved[key];
      }
    }
    CmsConfigManager.resetConfig();
    LogConfigManager.resetConfig();
  });

  test('should fall back to defaults when nothing is set', () => {
    expect(CmsConfigManager.getConfig()).toEqual(DEFAULT_CMS_CONFIG);
    expect(CmsConfigManager.validateConfig()).toEqual([]);
  });

  test('should read and coerce values from the environment', () => {
    process.env.CMS_MAX_SUPPORTING_ITEMS = '6';
    process.env.CMS_ICD10_TABLE_PATH = 'data/codes.csv';
    process.env.CMS_FUZZY_SCORE_CUTOFF = '72.5';

    expect(CmsConfigManager.getConfig()).toEqual({
      maxSupportingItems: 6,
      icd10TablePath: 'data/codes.csv',
      fuzzyScoreCutoff: 72.5,
    });
  });

  test('should reject invalid values and keep the defaults', () => {
    process.env.CMS_MAX_SUPPORTING_ITEMS = 'many';
    process.env.CMS_FUZZY_SCORE_CUTOFF = '140';

    const config = CmsConfigManager.getConfig();
    expect(config.maxSupportingItems).toBe(4);
    expect(config.fuzzyScoreCutoff).toBe(80);

    const rejected = CmsConfigManager.validateConfig();
    expect(rejected).toHaveLength(2);
    expect(rejected[0].startsWith('CMS_MAX_SUPPORTING_ITEMS: ')).toBe(true);
    expect(rejected[1].startsWith('CMS_FUZZY_SCORE_CUTOFF: ')).toBe(true);
  });

  test('should cache the configuration until it is reset', () => {
    expect(CmsConfigManager.getConfig().maxSupportingItems).toBe(4);
    process.env.CMS_MAX_SUPPORTING_ITEMS = '2';
    expect(CmsConfigManager.getConfig().maxSupportingItems).toBe(4);
    CmsConfigManager.resetConfig();
    expect(CmsConfigManager.getConfig().maxSupportingItems).toBe(2);
  });

  test('should load variables from an env file without overriding existing ones', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cms-config-'));
    const envPath = path.join(dir, '.env.local');
    fs.writeFileSync(envPath, 'CMS_MAX_SUPPORTING_ITEMS=3\nCMS_ICD10_TABLE_PATH=from-file.csv\n');
    process.env.CMS_ICD10_TABLE_PATH = 'from-env.csv';

    try {
      CmsConfigManager.loadEnvironment(envPath);
      expect(CmsConfigManager.getConfig()).toEqual({
        maxSupportingItems: 3,
        icd10TablePath: 'from-env.csv',
        fuzzyScoreCutoff: 80,
      });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  test('should parse log settings with fallbacks', () => {
    process.env.CMS_LOG_LEVEL = 'warn';
    expect(LogConfigManager.getLogLevel()).toBe(LogLevel.WARN);

    LogConfigManager.resetConfig();
    process.env.CMS_LOG_LEVEL = 'verbose';
    expect(LogConfigManager.getLogLevel()).toBe(LogLevel.INFO);
    expect(LogConfigManager.getConfig().logDirectory).toBe('logs/');
    expect(LogConfigManager.parseBoolean('1', false)).toBe(true);
    expect(LogConfigManager.parseBoolean('yes', true)).toBe(false);
    expect(LogConfigManager.parseBoolean(undefined, true)).toBe(true);
  });
});
