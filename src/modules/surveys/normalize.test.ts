import { InstrumentConfigurationError } from './errors';
import { fatigue, insomnia, isma } from './instruments';
import { buildKeyTable, canonicalizeKey, normalizeResponses, resolveKey } from './normalize';
import { InstrumentRegistry } from './registry';

describe('canonicalizeKey', () => {
  it('lower-cases and joins words with underscores', () => {
    expect(canonicalizeKey('Fall Asleep')).toBe('fall_asleep');
    expect(canonicalizeKey('  Neck Shoulder   Stiffness ')).toBe('neck_shoulder_stiffness');
    expect(canonicalizeKey('sleep_enough')).toBe('sleep_enough');
  });
});

describe('resolveKey', () => {
  const registry = new InstrumentRegistry();

  it.each([isma, insomnia, fatigue])('maps every declared key of $name to its canonical id', (definition) => {
    const instrument = registry.get(definition.name);
    for (const question of definition.questions) {
      expect(resolveKey(question.key ?? question.id, instrument)).toBe(question.id);
      expect(resolveKey(question.id, instrument)).toBe(question.id);
    }
  });

  it('falls back to the canonical form of the raw key', () => {
    expect(resolveKey('fall asleep', registry.get('insomnia'))).toBe('fall_asleep');
    expect(resolveKey('STOMACH UPSET', registry.get('fatigue'))).toBe('stomach_upset');
  });

  it('returns undefined for keys outside the instrument', () => {
    expect(resolveKey('Nap Length', registry.get('insomnia'))).toBeUndefined();
  });
});

describe('normalizeResponses', () => {
  const instrument = new InstrumentRegistry().get('insomnia');

  it('reports unknown keys as sent', () => {
    const result = normalizeResponses({ 'Fall Asleep': 1, 'Nap Length': 2 }, instrument);
    expect(result).toEqual({ responses: { fall_asleep: 1 }, unknown: ['Nap Length'], duplicate: [] });
  });

  it('reports a question reached through two keys', () => {
    const result = normalizeResponses({ 'Fall Asleep': 1, fall_asleep: 2 }, instrument);
    expect(result.responses).toEqual({ fall_asleep: 1 });
    expect(result.duplicate).toEqual(['fall_asleep']);
  });
});

describe('buildKeyTable', () => {
  it('rejects a wire key that collides with another question', () => {
    expect(() =>
      buildKeyTable({ ...isma, questions: [{ id: 'a', key: 'b' }, { id: 'b' }] })
    ).toThrow(InstrumentConfigurationError);
  });
});
