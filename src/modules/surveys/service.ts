import { safeLogger } from '../../security/safeLogger';
import { UnknownUserError } from '../users/errors';
import { UserStore } from '../users/store';
import { SurveyEngine, toSurveyResult } from './engine';
import { ResultStore } from './store';
import { Submission, SurveyResult } from './types';

export class SurveyService {
  constructor(
    private readonly engine: SurveyEngine,
    private readonly results: ResultStore,
    private readonly users: UserStore
  ) {}

  /** Nothing is written unless the submission scores cleanly and the user exists. */
  async submit(instrumentName: string, submission: Submission): Promise<SurveyResult> {
    const evaluation = this.engine.evaluate(instrumentName, submission);

    const user = await this.users.findById(submission.userId);
    if (!user) {
      throw new UnknownUserError(submission.userId);
    }

    const result = await this.results.save(toSurveyResult(evaluation));
    safeLogger.info('survey.submitted', {
      instrument: result.instrument,
      resultId: result.id,
      userId: result.userId,
      totalSum: result.totalSum,
    });
    return result;
  }

  async history(instrumentName: string, userId: string): Promise<SurveyResult[]> {
    const instrument = this.engine.getInstrument(instrumentName);
    return this.results.listByUser(instrument.name, userId);
  }
}
