import { AppError } from '../../errors';

export class SurveyError extends AppError {}

export class UnknownInstrumentError extends SurveyError {
  constructor(readonly instrument: string) {
    super('UNKNOWN_INSTRUMENT', `Unknown instrument '${instrument}'`);
  }
}

export type SubmissionIssues = {
  missing: string[];
  unexpected: string[];
  duplicate: string[];
  invalidValues: string[];
};

export type SubmissionErrorCode = 'MISSING_QUESTIONS' | 'UNEXPECTED_QUESTIONS' | 'INVALID_SUBMISSION';

export class SubmissionValidationError extends SurveyError {
  declare readonly code: SubmissionErrorCode;

  constructor(readonly instrument: string, readonly issues: SubmissionIssues) {
    super(codeFor(issues), describeIssues(instrument, issues));
  }

  details(): Record<string, unknown> {
    return { instrument: this.instrument, ...this.issues };
  }
}

function codeFor(issues: SubmissionIssues): SubmissionErrorCode {
  const onlyMissing = !issues.unexpected.length && !issues.duplicate.length && !issues.invalidValues.length;
  const onlyUnexpected = !issues.missing.length && !issues.duplicate.length && !issues.invalidValues.length;
  if (issues.missing.length && onlyMissing) return 'MISSING_QUESTIONS';
  if (issues.unexpected.length && onlyUnexpected) return 'UNEXPECTED_QUESTIONS';
  return 'INVALID_SUBMISSION';
}

function describeIssues(instrument: string, issues: SubmissionIssues): string {
  const parts: string[] = [];
  if (issues.missing.length) parts.push(`missing: ${issues.missing.join(', ')}`);
  if (issues.unexpected.length) parts.push(`unexpected: ${issues.unexpected.join(', ')}`);
  if (issues.duplicate.length) parts.push(`answered more than once: ${issues.duplicate.join(', ')}`);
  if (issues.invalidValues.length) parts.push(`out of range: ${issues.invalidValues.join(', ')}`);
  return `Invalid ${instrument} submission (${parts.join('; ')})`;
}

export class NoMatchingBandError extends SurveyError {
  constructor(readonly instrument: string, readonly totalSum: number) {
    super('NO_MATCHING_BAND', `No score band of '${instrument}' contains ${totalSum}`);
  }
}

export class InstrumentConfigurationError extends SurveyError {
  constructor(readonly instrument: string, detail: string) {
    super('INSTRUMENT_MISCONFIGURED', `Instrument '${instrument}' is misconfigured: ${detail}`);
  }
}
