/**
 * Note pipeline: abbreviation expansion, diagnosis detection and analysis
 */

import { TerminologyLookupError } from '../lib/cms/errors';
import { expandAbbreviations } from '../lib/services/abbreviation-expander';
import { detectDiagnoses } from '../lib/services/diagnosis-detector';
import { analyzeNote } from '../lib/services/note-analyzer';
import { TerminologyLookupService } from '../lib/services/terminology-lookup-service';

const NOTE =
  'Patient with HTN and DM2, uncontrolled. New onset pneumonia of right lung with sepsis, on ceftriaxone.';

class RecordingTerminologyService implements TerminologyLookupService {
  calls: Array<[string, string]> = [];

  async lookup(modifier: string, diagnosisText: string): Promise<string> {
    this.calls.push([modifier, diagnosisText]);
    return `${diagnosisText.toUpperCase()} (X00)`;
  }
}

describe('Abbreviation expander', () => {
  test('should expand whole-word abbreviations', () => {
    expect(expandAbbreviations('HTN, DM2 and AFib; COPD stable')).toBe(
      'Hypertension, Type 2 diabetes mellitus and Atrial fibrillation; Chronic obstructive pulmonary disease stable',
    );
  });

  test('should leave lower-case forms and embedded letters alone', () => {
    expect(expandAbbreviations('htn and CKDx with OSA-like symptoms')).toBe(
      'htn and CKDx with Obstructive sleep apnea-like symptoms',
    );
  });

  test('should accept a custom abbreviation table', () => {
    expect(expandAbbreviations('SOB on exertion', { SOB: 'Shortness of breath' })).toBe(
      'Shortness of breath on exertion',
    );
  });
});

describe('Diagnosis detector', () => {
  test('should report known diagnoses in table order, once each', () => {
    expect(
      detectDiagnoses('Pneumonia improving. hypertension controlled. Type 2 diabetes mellitus. Pneumonia again.'),
    ).toEqual(['Type 2 diabetes mellitus', 'Hypertension', 'Pneumonia']);
  });

  test('should require whole words', () => {
    expect(detectDiagnoses('anemias and pneumonias')).toEqual([]);
    expect(detectDiagnoses('')).toEqual([]);
  });
});

describe('analyzeNote', () => {
  test('should build one problem per detected diagnosis', async () => {
    const analysis = await analyzeNote(NOTE);

    expect(analysis.expandedText).toBe(
      'Patient with Hypertension and Type 2 diabetes mellitus, uncontrolled. New onset pneumonia of right lung with sepsis, on ceftriaxone.',
    );
    expect(analysis.diagnoses).toEqual(['Type 2 diabetes mellitus', 'Hypertension', 'Pneumonia']);
    expect(analysis.classification).toEqual({
      modifier: 'acute',
      complication: 'sepsis',
      etiology: 'unspecified',
      stage: 'unspecified',
      laterality: 'right',
      location: 'chest lung',
      temporal: 'new onset',
      context: 'unspecified',
    });
    expect(analysis.supportingData).toBe('ceftriaxone, pneumonia');
    expect(analysis.problemList.text.split('\n')).toEqual([
      '# CMS-Ready Problem List',
      '1. New onset Type 2 diabetes mellitus with sepsis right chest lung — ceftriaxone, pneumonia',
      '2. New onset Hypertension with sepsis right chest lung — ceftriaxone, pneumonia',
      '3. New onset Pneumonia with sepsis right chest lung — ceftriaxone, pneumonia',
    ]);
    expect(analysis.coded).toEqual([]);
  });

  test('should cap supporting data per the option', async () => {
    const analysis = await analyzeNote(NOTE, { maxSupportingItems: 1 });
    expect(analysis.supportingData).toBe('ceftriaxone');
    expect(analysis.records[0].supportingData).toBe('ceftriaxone');
  });

  test('should return an empty analysis when no diagnosis is recognized', async () => {
    const analysis = await analyzeNote('Patient feels well today.');
    expect(analysis.diagnoses).toEqual([]);
    expect(analysis.records).toEqual([]);
    expect(analysis.problemList.text).toBe('# CMS-Ready Problem List');
    expect(analysis.supportingData).toBe('⚠️ No supporting data');
  });

  test('should code each diagnosis with the classified modifier', async () => {
    const terminology = new RecordingTerminologyService();
    const analysis = await analyzeNote(NOTE, { terminology });

    expect(terminology.calls).toEqual([
      ['acute', 'Type 2 diabetes mellitus'],
      ['acute', 'Hypertension'],
      ['acute', 'Pneumonia'],
    ]);
    expect(analysis.coded[2]).toEqual({ diagnosis: 'Pneumonia', description: 'PNEUMONIA (X00)' });
  });

  test('should pass an empty modifier when none was classified', async () => {
    const terminology = new RecordingTerminologyService();
    await analyzeNote('Anemia noted.', { terminology });
    expect(terminology.calls).toEqual([['', 'Anemia']]);
  });

  test('should mark a failed lookup as unavailable and keep going', async () => {
    const terminology: TerminologyLookupService = {
      lookup: async (_modifier, diagnosisText) => {
        if (diagnosisText === 'Hypertension') {
          throw new TerminologyLookupError('table offline');
        }
        return `${diagnosisText} (X00)`;
      },
    };
    const warnings: string[] = [];
    const analysis = await analyzeNote(NOTE, {
      terminology,
      logger: {
        logDebug: () => undefined,
        logInfo: () => undefined,
        logWarn: (_fn, message) => warnings.push(message),
        logError: () => undefined,
      },
    });

    expect(analysis.coded.map((entry) => entry.description)).toEqual([
      'Type 2 diabetes mellitus (X00)',
      '⚠️ ICD-10 mapping unavailable',
      'Pneumonia (X00)',
    ]);
    expect(warnings).toEqual(['Terminology lookup failed for Hypertension']);
  });
});
