import { assertBandTable, buildScoreBands } from './bands';
import { InstrumentConfigurationError, UnknownInstrumentError } from './errors';
import { DEFAULT_INSTRUMENTS } from './instruments';
import { buildKeyTable } from './normalize';
import { Instrument, InstrumentDefinition } from './types';

export function buildInstrument(definition: InstrumentDefinition): Instrument {
  const { name, questions, responseRange } = definition;

  if (!questions.length) {
    throw new InstrumentConfigurationError(name, 'no questions defined');
  }
  const questionIds = questions.map((q) => q.id);
  const seen = new Set<string>();
  for (const id of questionIds) {
    if (!id) throw new InstrumentConfigurationError(name, 'question id must not be empty');
    if (seen.has(id)) throw new InstrumentConfigurationError(name, `question '${id}' is declared twice`);
    seen.add(id);
  }

  if (
    !Number.isInteger(responseRange.min) ||
    !Number.isInteger(responseRange.max) ||
    responseRange.min > responseRange.max
  ) {
    throw new InstrumentConfigurationError(name, 'response range must be an ascending integer pair');
  }

  const minScore = questionIds.length * responseRange.min;
  const maxScore = questionIds.length * responseRange.max;

  const instrument: Instrument = Object.freeze({
    name: normalizeName(name),
    title: definition.title,
    collection: definition.collection,
    questionIds: Object.freeze(questionIds),
    externalKeys: Object.freeze(Object.fromEntries(questions.map((q) => [q.id, q.key ?? q.id]))),
    keyTable: buildKeyTable(definition),
    responseRange: Object.freeze({ ...responseRange }),
    bands: Object.freeze(buildScoreBands(definition, minScore)),
    minScore,
    maxScore,
  });

  assertBandTable(instrument);
  return instrument;
}

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Read-only lookup over the instruments the process was started with.
 * Construction fails if any band table leaves a gap or overlaps.
 */
export class InstrumentRegistry {
  private readonly instruments = new Map<string, Instrument>();

  constructor(definitions: readonly InstrumentDefinition[] = DEFAULT_INSTRUMENTS) {
    for (const definition of definitions) {
      const instrument = buildInstrument(definition);
      if (this.instruments.has(instrument.name)) {
        throw new InstrumentConfigurationError(instrument.name, 'registered twice');
      }
      this.instruments.set(instrument.name, instrument);
    }
  }

  get(name: string): Instrument {
    const instrument = this.instruments.get(normalizeName(name));
    if (!instrument) throw new UnknownInstrumentError(name);
    return instrument;
  }

  has(name: string): boolean {
    return this.instruments.has(normalizeName(name));
  }

  list(): Instrument[] {
    return [...this.instruments.values()];
  }
}
