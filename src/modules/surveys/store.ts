import { Connection, Model } from 'mongoose';
import { UnknownInstrumentError } from './errors';
import { InstrumentRegistry } from './registry';
import { LeanResultRow, ResultRow, resultModelFor } from './result.model';
import { Instrument, NewSurveyResult, SurveyResult } from './types';

export interface ResultStore {
  save(result: NewSurveyResult): Promise<SurveyResult>;
  /** Newest first. */
  listByUser(instrument: string, userId: string): Promise<SurveyResult[]>;
}

export class MongoResultStore implements ResultStore {
  private readonly models = new Map<string, { instrument: Instrument; model: Model<ResultRow> }>();

  constructor(connection: Connection, registry: InstrumentRegistry) {
    for (const instrument of registry.list()) {
      this.models.set(instrument.name, { instrument, model: resultModelFor(connection, instrument) });
    }
  }

  async save(result: NewSurveyResult): Promise<SurveyResult> {
    const { instrument, model } = this.entryFor(result.instrument);
    const doc = await model.create({
      userId: result.userId,
      responses: toResponseFields(instrument, result.responses),
      totalSum: result.totalSum,
      label: { mn: result.label.mn, en: result.label.en },
    });
    return fromResultRow(instrument, doc.toObject<LeanResultRow>());
  }

  async listByUser(instrumentName: string, userId: string): Promise<SurveyResult[]> {
    const { instrument, model } = this.entryFor(instrumentName);
    const rows = await model.find({ userId }).sort({ createdAt: -1, _id: -1 }).lean<LeanResultRow[]>();
    return rows.map((row) => fromResultRow(instrument, row));
  }

  private entryFor(name: string) {
    const entry = this.models.get(name);
    if (!entry) throw new UnknownInstrumentError(name);
    return entry;
  }
}

/** Question fields in questionnaire order. */
export function toResponseFields(instrument: Instrument, responses: Readonly<Record<string, number>>): Record<string, number> {
  const fields: Record<string, number> = {};
  for (const id of instrument.questionIds) {
    fields[id] = responses[id];
  }
  return fields;
}

export function fromResultRow(instrument: Instrument, row: LeanResultRow): SurveyResult {
  return {
    id: row._id.toString(),
    instrument: instrument.name,
    userId: row.userId,
    responses: toResponseFields(instrument, row.responses),
    totalSum: row.totalSum,
    label: { mn: row.label.mn, en: row.label.en },
    createdAt: row.createdAt.toISOString(),
  };
}
