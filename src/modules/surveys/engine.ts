import { InstrumentRegistry } from './registry';
import { resolveBand, scoreSubmission } from './scoring';
import { Instrument, NewSurveyResult, ResponseMap, ScoreBand, Submission } from './types';
import { validateSubmission } from './validation';

export type Evaluation = {
  instrument: Instrument;
  userId: string;
  responses: ResponseMap;
  totalSum: number;
  band: ScoreBand;
};

export class SurveyEngine {
  constructor(private readonly registry: InstrumentRegistry) {}

  getInstrument(name: string): Instrument {
    return this.registry.get(name);
  }

  /** Lookup, normalization, validation, scoring, classification. Throws on the first failing stage. */
  evaluate(instrumentName: string, submission: Submission): Evaluation {
    const instrument = this.registry.get(instrumentName);

    const validation = validateSubmission(submission, instrument);
    if (!validation.ok) {
      throw validation.error;
    }

    const totalSum = scoreSubmission(validation.data);
    const band = resolveBand(totalSum, instrument);

    return {
      instrument,
      userId: validation.data.userId,
      responses: validation.data.responses,
      totalSum,
      band,
    };
  }
}

export function toSurveyResult(evaluation: Evaluation): NewSurveyResult {
  return {
    instrument: evaluation.instrument.name,
    userId: evaluation.userId,
    responses: evaluation.responses,
    totalSum: evaluation.totalSum,
    label: evaluation.band.label,
  };
}
