import { Connection, Model, Schema, SchemaDefinition, Types } from 'mongoose';
import { Instrument } from './types';

export type ResultRow = {
  userId: string;
  responses: Record<string, number>;
  totalSum: number;
  label: { mn: string; en: string };
  createdAt: Date;
};

export type LeanResultRow = ResultRow & { _id: Types.ObjectId };

// One required numeric field per canonical question id.
function buildResponsesSchema(instrument: Instrument): Schema {
  const fields: SchemaDefinition = {};
  for (const id of instrument.questionIds) {
    fields[id] = {
      type: Number,
      required: true,
      min: instrument.responseRange.min,
      max: instrument.responseRange.max,
    };
  }
  return new Schema(fields, { _id: false, strict: 'throw' });
}

export function buildResultSchema(instrument: Instrument): Schema<ResultRow> {
  return new Schema<ResultRow>(
    {
      userId: { type: String, required: true, index: true },
      responses: { type: buildResponsesSchema(instrument), required: true },
      totalSum: { type: Number, required: true },
      label: {
        mn: { type: String, required: true },
        en: { type: String, required: true },
      },
      createdAt: { type: Date, default: Date.now },
    },
    { versionKey: false }
  );
}

export function resultModelFor(connection: Connection, instrument: Instrument): Model<ResultRow> {
  return connection.model<ResultRow>(`${instrument.name}_result`, buildResultSchema(instrument), instrument.collection);
}
