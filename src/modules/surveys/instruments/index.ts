import { InstrumentDefinition } from '../types';
import { fatigue } from './fatigue';
import { insomnia } from './insomnia';
import { isma } from './isma';

export const DEFAULT_INSTRUMENTS: readonly InstrumentDefinition[] = [isma, insomnia, fatigue];

export { fatigue, insomnia, isma };
