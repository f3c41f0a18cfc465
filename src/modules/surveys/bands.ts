import { InstrumentConfigurationError } from './errors';
import { Instrument, InstrumentDefinition, ScoreBand } from './types';

/**
 * Turns a threshold list into integer intervals. The first band is open below
 * and the last open above; `minScore` only anchors the ordering check.
 * Each instrument keeps its own comparator, so `lte` 5 and `lt` 6 describe
 * the same upper bound.
 */
export function buildScoreBands(definition: InstrumentDefinition, minScore: number): ScoreBand[] {
  const { name, boundary, bands } = definition;
  if (!bands.length) {
    throw new InstrumentConfigurationError(name, 'band table is empty');
  }

  const result: ScoreBand[] = [];
  let low: number | null = null;
  let floor = minScore;

  for (const [index, band] of bands.entries()) {
    const isLast = index === bands.length - 1;

    if (band.threshold === null) {
      if (!isLast) {
        throw new InstrumentConfigurationError(name, 'only the last band may be unbounded');
      }
      result.push({ low, high: null, label: band.label });
      continue;
    }

    if (isLast) {
      throw new InstrumentConfigurationError(name, 'the last band must be unbounded');
    }
    if (!Number.isInteger(band.threshold)) {
      throw new InstrumentConfigurationError(name, `threshold ${band.threshold} is not an integer`);
    }

    const high = boundary === 'lte' ? band.threshold : band.threshold - 1;
    if (high < floor) {
      throw new InstrumentConfigurationError(name, `band '${band.label.en}' is empty or out of order`);
    }
    result.push({ low, high, label: band.label });
    low = high + 1;
    floor = low;
  }

  return result;
}

export function bandContains(band: ScoreBand, totalSum: number): boolean {
  return (band.low === null || totalSum >= band.low) && (band.high === null || totalSum <= band.high);
}

// Every achievable sum must fall into exactly one band.
export function assertBandTable(instrument: Instrument): void {
  for (let sum = instrument.minScore; sum <= instrument.maxScore; sum += 1) {
    const matches = instrument.bands.filter((band) => bandContains(band, sum)).length;
    if (matches !== 1) {
      throw new InstrumentConfigurationError(instrument.name, `${matches} bands contain the sum ${sum}`);
    }
  }
}
