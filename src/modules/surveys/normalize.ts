import { InstrumentConfigurationError } from './errors';
import { Instrument, InstrumentDefinition, ResponseMap } from './types';

export function canonicalizeKey(raw: string): string {
  return raw.trim().toLowerCase().replace(/\s+/g, '_');
}

/** Declared wire keys plus every canonical id mapped onto itself. */
export function buildKeyTable(definition: InstrumentDefinition): Map<string, string> {
  const table = new Map<string, string>();

  const add = (key: string, id: string) => {
    const existing = table.get(key);
    if (existing !== undefined && existing !== id) {
      throw new InstrumentConfigurationError(definition.name, `key '${key}' maps to both '${existing}' and '${id}'`);
    }
    table.set(key, id);
  };

  for (const question of definition.questions) {
    add(question.id, question.id);
    if (question.key) add(question.key, question.id);
  }

  return table;
}

export type NormalizedResponses = {
  responses: Record<string, number>;
  /** Raw keys that match no question, as the caller sent them. */
  unknown: string[];
  /** Canonical ids reached by more than one raw key. */
  duplicate: string[];
};

export function resolveKey(rawKey: string, instrument: Instrument): string | undefined {
  return instrument.keyTable.get(rawKey) ?? instrument.keyTable.get(canonicalizeKey(rawKey));
}

export function normalizeResponses(responses: ResponseMap, instrument: Instrument): NormalizedResponses {
  const normalized: Record<string, number> = {};
  const unknown: string[] = [];
  const duplicate: string[] = [];

  for (const [rawKey, value] of Object.entries(responses)) {
    const id = resolveKey(rawKey, instrument);
    if (id === undefined) {
      unknown.push(rawKey);
      continue;
    }
    if (Object.hasOwn(normalized, id)) {
      if (!duplicate.includes(id)) duplicate.push(id);
      continue;
    }
    normalized[id] = value;
  }

  return { responses: normalized, unknown, duplicate };
}
