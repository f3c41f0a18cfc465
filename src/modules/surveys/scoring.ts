import { bandContains } from './bands';
import { NoMatchingBandError } from './errors';
import { Instrument, Locale, ScoreBand } from './types';
import { ValidatedSubmission } from './validation';

export function scoreSubmission(submission: ValidatedSubmission): number {
  return submission.instrument.questionIds.reduce((sum, id) => sum + submission.responses[id], 0);
}

export function resolveBand(totalSum: number, instrument: Instrument): ScoreBand {
  const band = instrument.bands.find((candidate) => bandContains(candidate, totalSum));
  if (!band) {
    throw new NoMatchingBandError(instrument.name, totalSum);
  }
  return band;
}

export function classify(totalSum: number, instrument: Instrument, locale: Locale = 'mn'): string {
  return resolveBand(totalSum, instrument).label[locale];
}
