/**
 * Axis registry construction and validation
 */

import { defineAxisRegistry, labelSet, validateAxisTable } from '../lib/cms/axis-registry';
import { RegistryDefinitionError } from '../lib/cms/errors';
import { AXIS_REGISTRIES } from '../lib/cms/registries';
import { AXIS_NAMES } from '../lib/cms/types';

describe('Axis registry', () => {
  test('should validate a well-formed table with no errors', () => {
    expect(
      validateAxisTable({
        axis: 'context',
        description: 'test',
        priority: ['confirmed', 'possible'],
        rules: { confirmed: ['\\bconfirmed\\b'], possible: ['\\bpossible\\b'] },
      }),
    ).toEqual([]);
  });

  test('should report duplicate, missing and orphaned labels', () => {
    const errors = validateAxisTable({
      axis: 'context',
      description: 'test',
      priority: ['confirmed', 'confirmed', 'possible'],
      rules: { confirmed: ['\\bconfirmed\\b'], ruled_out: ['\\bruled out\\b'] },
    });

    expect(errors).toEqual([
      'Label "confirmed" appears more than once in priority',
      'Label "possible" has no rules',
      'Label "ruled_out" is missing from priority',
    ]);
  });

  test('should refuse to build a registry that breaks the invariants', () => {
    expect(() =>
      defineAxisRegistry({
        axis: 'stage',
        description: 'test',
        priority: ['mild'],
        rules: { mild: ['\\bmild\\b'], severe: ['\\bsevere\\b'] },
      }),
    ).toThrow(RegistryDefinitionError);
  });

  test('should refuse malformed table data and invalid patterns', () => {
    expect(() => defineAxisRegistry({ axis: 'severity', priority: [], rules: {} })).toThrow(
      'Malformed axis table',
    );
    expect(() =>
      defineAxisRegistry({
        axis: 'stage',
        description: 'test',
        priority: ['mild'],
        rules: { mild: ['(unclosed'] },
      }),
    ).toThrow('Invalid pattern "(unclosed"');
  });

  test('should keep the declared priority order and freeze the result', () => {
    const registry = defineAxisRegistry({
      axis: 'laterality',
      description: 'test',
      priority: ['right', 'left'],
      rules: { left: ['\\bleft\\b'], right: ['\\bright\\b', '\\brt\\b'] },
    });

    expect(registry.priority).toEqual(['right', 'left']);
    expect(registry.entries.map((entry) => entry.label)).toEqual(['right', 'left']);
    expect(registry.entries[0].rules.map((rule) => rule.source)).toEqual(['\\bright\\b', '\\brt\\b']);
    expect(Object.isFrozen(registry)).toBe(true);
    expect(Object.isFrozen(registry.entries)).toBe(true);
    expect(labelSet(registry)).toEqual(new Set(['right', 'left', 'unspecified']));
  });

  test('should load all eight built-in registries', () => {
    expect(Object.keys(AXIS_REGISTRIES)).toEqual([...AXIS_NAMES]);
    for (const axis of AXIS_NAMES) {
      const registry = AXIS_REGISTRIES[axis];
      expect(registry.axis).toBe(axis);
      expect(new Set(registry.priority).size).toBe(registry.priority.length);
    }
  });

  test('should start the modifier priority with the compound acute-on-chronic label', () => {
    expect(AXIS_REGISTRIES.modifier.priority.slice(0, 3)).toEqual([
      'acute_on_chronic',
      'acute',
      'chronic',
    ]);
  });
});
