import { SubmissionValidationError } from './errors';
import { normalizeResponses } from './normalize';
import { Instrument, ResponseMap, ResponseRange, Submission } from './types';

const VALIDATED = Symbol('validated');

/** Canonical, complete and in-range responses. Only `validateSubmission` creates one. */
export type ValidatedSubmission = Readonly<{
  instrument: Instrument;
  userId: string;
  responses: ResponseMap;
  [VALIDATED]: true;
}>;

export type ValidationResult =
  | { ok: true; data: ValidatedSubmission }
  | { ok: false; error: SubmissionValidationError };

export function validateSubmission(submission: Submission, instrument: Instrument): ValidationResult {
  const { responses, unknown, duplicate } = normalizeResponses(submission.responses, instrument);

  const missing = instrument.questionIds.filter((id) => !Object.hasOwn(responses, id));
  const invalidValues = instrument.questionIds.filter(
    (id) => Object.hasOwn(responses, id) && !isAcceptedValue(responses[id], instrument.responseRange)
  );

  if (missing.length || unknown.length || duplicate.length || invalidValues.length) {
    return {
      ok: false,
      error: new SubmissionValidationError(instrument.name, {
        missing,
        unexpected: unknown,
        duplicate,
        invalidValues,
      }),
    };
  }

  const ordered: Record<string, number> = {};
  for (const id of instrument.questionIds) {
    ordered[id] = responses[id];
  }

  return {
    ok: true,
    data: Object.freeze({
      instrument,
      userId: submission.userId,
      responses: Object.freeze(ordered),
      [VALIDATED]: true as const,
    }),
  };
}

function isAcceptedValue(value: number, range: ResponseRange): boolean {
  return Number.isInteger(value) && value >= range.min && value <= range.max;
}
