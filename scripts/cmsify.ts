#!/usr/bin/env node

/**
 * cmsify: prints a CMS-ready problem list for a note or a set of diagnosis records.
 *
 *   cmsify note.txt
 *   cmsify "Acute pneumonia with sepsis, right lung"
 *   cmsify records.json --max-items 2
 *   cmsify note.txt --explain
 */

import * as fs from 'fs';
import * as path from 'path';
import { CmsConfigManager } from '../lib/config/cms-config';
import { CMS_ERROR_CODES, describeError } from '../lib/cms/errors';
import { explainAll } from '../lib/cms/priority-classifier';
import { buildProblemList } from '../lib/cms/problem-list-builder';
import { UNSPECIFIED } from '../lib/cms/types';
import { WorkflowLogger } from '../lib/logging/logging';
import { analyzeNote } from '../lib/services/note-analyzer';
import {
  IcdTerminologyServiceImpl,
  TerminologyLookupService,
} from '../lib/services/terminology-lookup-service';

export const USAGE = `Usage: cmsify <note.txt | note text... | records.json> [--max-items <n>] [--explain]

  note.txt          analyze a free-text clinical note
  records.json      render an array of diagnosis records
  --max-items <n>   supporting-data fragments per problem (default 4)
  --explain         show the rule behind each axis classification`;

export const NO_DIAGNOSES_FOUND = '⚠️ No clear diagnoses found';

export interface CliOptions {
  inputs: string[];
  maxItems?: number;
  explain: boolean;
  help: boolean;
}

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const defaultIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export function parseCliArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { inputs: [], explain: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--explain':
        options.explain = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--max-items': {
        const value = args[++i];
        if (value === undefined || !/^\d+$/.test(value)) {
          throw new CliUsageError(`--max-items expects a non-negative integer, got '${value ?? ''}'`);
        }
        options.maxItems = Number(value);
        break;
      }
      default:
        options.inputs.push(arg);
    }
  }

  return options;
}

async function readInputFile(filePath: string): Promise<string> {
  try {
    return await fs.promises.readFile(filePath, 'utf8');
  } catch (error) {
    throw new CliUsageError(`Cannot read '${filePath}': ${describeError(error)}`);
  }
}

function parseRecords(content: string, filePath: string): unknown[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new CliUsageError(`'${filePath}' is not valid JSON: ${describeError(error)}`);
  }
  if (!Array.isArray(parsed)) {
    throw new CliUsageError(`'${filePath}' must contain an array of diagnosis records`);
  }
  return parsed;
}

async function openTerminology(
  logger: WorkflowLogger,
): Promise<TerminologyLookupService | undefined> {
  const { icd10TablePath, fuzzyScoreCutoff } = CmsConfigManager.getConfig();
  const service = new IcdTerminologyServiceImpl({
    tablePath: path.resolve(icd10TablePath),
    scoreCutoff: fuzzyScoreCutoff,
    logger,
  });

  try {
    await service.load();
  } catch (error) {
    logger.logWarn('cmsify', 'Code table could not be loaded', { error: describeError(error) });
    return undefined;
  }
  return service.isAvailable() ? service : undefined;
}

async function runNote(
  noteText: string,
  options: CliOptions,
  logger: WorkflowLogger,
  io: CliIO,
): Promise<void> {
  const terminology = await openTerminology(logger);
  const analysis = await analyzeNote(noteText, {
    maxSupportingItems: options.maxItems ?? CmsConfigManager.getConfig().maxSupportingItems,
    terminology,
    logger,
  });

  if (analysis.diagnoses.length === 0) {
    io.out(NO_DIAGNOSES_FOUND);
    return;
  }

  io.out(analysis.problemList.text);

  if (options.explain) {
    io.out('');
    io.out('# Classification');
    for (const explanation of explainAll(analysis.expandedText)) {
      const detail =
        explanation.label === UNSPECIFIED
          ? ''
          : ` (rule ${explanation.matchedRule} matched "${explanation.matchedText}")`;
      io.out(`- ${explanation.axis}: ${explanation.label}${detail}`);
    }
  }

  if (analysis.coded.length > 0) {
    io.out('');
    io.out('# Coded Terminology');
    for (const { diagnosis, description } of analysis.coded) {
      io.out(`- ${diagnosis}: ${description}`);
    }
  }
}

/**
 * Runs the command line and returns the process exit code.
 */
export async function runCmsify(args: readonly string[], io: CliIO = defaultIO): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(args);
  } catch (error) {
    io.err(`Error: ${describeError(error)}`);
    io.err(USAGE);
    return 1;
  }

  if (options.help || options.inputs.length === 0) {
    io.out(USAGE);
    return 0;
  }

  const logger = new WorkflowLogger(undefined, { enableConsoleLogging: false, runLabel: 'cmsify' });
  for (const rejected of CmsConfigManager.validateConfig()) {
    logger.logWarn('cmsify', `Ignoring configuration value ${rejected}`, {
      code: CMS_ERROR_CODES.CONFIG_INVALID,
    });
  }

  try {
    const [first] = options.inputs;
    const extension = options.inputs.length === 1 ? path.extname(first).toLowerCase() : '';

    if (extension === '.json') {
      const records = parseRecords(await readInputFile(first), first);
      io.out(buildProblemList(records, { logger }).text);
    } else if (extension === '.txt') {
      await runNote(await readInputFile(first), options, logger, io);
    } else {
      await runNote(options.inputs.join(' '), options, logger, io);
    }
    return 0;
  } catch (error) {
    logger.logError('cmsify', 'Run failed', { error: describeError(error) });
    io.err(`Error: ${describeError(error)}`);
    return 1;
  } finally {
    await logger.close();
  }
}

if (require.main === module) {
  CmsConfigManager.loadEnvironment();
  runCmsify(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      console.error(`Error: ${describeError(error)}`);
      process.exit(1);
    });
}
