export type Locale = 'mn' | 'en';

export type LocalizedText = Readonly<Record<Locale, string>>;

/**
 * How the thresholds of a band table compare against the total:
 * `lte` puts the threshold itself in the band, `lt` puts it in the next one.
 */
export type BoundaryStyle = 'lte' | 'lt';

export type QuestionDefinition = {
  /** Canonical identifier, also the storage field name. */
  id: string;
  /** Wire-level key when callers send something other than the canonical id. */
  key?: string;
};

export type BandThreshold = {
  /** `null` marks the catch-all band and must come last. */
  threshold: number | null;
  label: LocalizedText;
};

export type InstrumentDefinition = {
  name: string;
  title: string;
  collection: string;
  questions: readonly QuestionDefinition[];
  responseRange: ResponseRange;
  boundary: BoundaryStyle;
  bands: readonly BandThreshold[];
};

export type ResponseRange = Readonly<{ min: number; max: number }>;

/** Integer interval; a `null` bound is open on that side. */
export type ScoreBand = Readonly<{
  low: number | null;
  high: number | null;
  label: LocalizedText;
}>;

export type Instrument = Readonly<{
  name: string;
  title: string;
  collection: string;
  questionIds: readonly string[];
  externalKeys: Readonly<Record<string, string>>;
  keyTable: ReadonlyMap<string, string>;
  responseRange: ResponseRange;
  bands: readonly ScoreBand[];
  minScore: number;
  maxScore: number;
}>;

export type ResponseMap = Readonly<Record<string, number>>;

export type Submission = {
  userId: string;
  responses: ResponseMap;
};

export type SurveyResult = {
  id: string;
  instrument: string;
  userId: string;
  responses: ResponseMap;
  totalSum: number;
  label: LocalizedText;
  createdAt: string;
};

export type NewSurveyResult = Omit<SurveyResult, 'id' | 'createdAt'>;
