import mongoose from 'mongoose';
import { InstrumentRegistry } from './registry';
import { ResultRow, buildResultSchema } from './result.model';

describe('result schema', () => {
  const instrument = new InstrumentRegistry().get('insomnia');
  const schema = buildResultSchema(instrument);
  // No connection in unit tests; keep model compilation from queueing collection work.
  schema.set('autoIndex', false);
  schema.set('autoCreate', false);
  const InsomniaResult = mongoose.model<ResultRow>('insomnia_result_schema_test', schema);

  const responses = {
    fall_asleep: 1,
    stay_asleep: 1,
    early_rising: 1,
    sleep_satisfaction: 1,
    daily_impact: 1,
    life_quality: 1,
    sleep_concern: 1,
  };
  const label = { mn: 'Нойргүйдэл байхгүй', en: 'none' };

  it('accepts a row with one field per question', () => {
    const doc = new InsomniaResult({ userId: 'user-1', responses, totalSum: 7, label });
    expect(doc.validateSync()).toBeFalsy();
    expect(doc.createdAt).toBeInstanceOf(Date);
  });

  it('requires every question field', () => {
    const { sleep_concern: _dropped, ...partial } = responses;
    const doc = new InsomniaResult({ userId: 'user-1', responses: partial, totalSum: 6, label });
    const error = doc.validateSync();
    expect(error?.errors['responses.sleep_concern']).toBeDefined();
  });

  it('bounds stored values by the response range', () => {
    const doc = new InsomniaResult({ userId: 'user-1', responses: { ...responses, fall_asleep: 5 }, totalSum: 11, label });
    const error = doc.validateSync();
    expect(error?.errors['responses.fall_asleep']?.kind).toBe('max');
  });
});
