import { SurveyEngine, toSurveyResult } from './engine';
import { SubmissionValidationError, UnknownInstrumentError } from './errors';
import { InstrumentRegistry } from './registry';

describe('SurveyEngine', () => {
  const engine = new SurveyEngine(new InstrumentRegistry());

  const insomniaAnswers = {
    'Fall Asleep': 3,
    'Stay Asleep': 3,
    'Early Rising': 2,
    'Sleep Satisfaction': 4,
    'Daily Impact': 3,
    'Life Quality': 3,
    'Sleep Concern': 4,
  };

  it('normalizes, scores and classifies a submission', () => {
    const evaluation = engine.evaluate('insomnia', { userId: 'user-9', responses: insomniaAnswers });
    expect(evaluation.instrument.name).toBe('insomnia');
    expect(evaluation.userId).toBe('user-9');
    expect(evaluation.responses).toEqual({
      fall_asleep: 3,
      stay_asleep: 3,
      early_rising: 2,
      sleep_satisfaction: 4,
      daily_impact: 3,
      life_quality: 3,
      sleep_concern: 4,
    });
    expect(evaluation.totalSum).toBe(22);
    expect(evaluation.band.label.en).toBe('severe');
  });

  it('fails on an unknown instrument before looking at the answers', () => {
    expect(() => engine.evaluate('sleepiness', { userId: 'user-9', responses: {} })).toThrow(UnknownInstrumentError);
  });

  it('throws the validation error for incomplete submissions', () => {
    const { 'Sleep Concern': _dropped, ...partial } = insomniaAnswers;
    expect(() => engine.evaluate('insomnia', { userId: 'user-9', responses: partial })).toThrow(
      SubmissionValidationError
    );
  });

  it('builds a result whose total matches its stored responses', () => {
    const fatigue = engine.getInstrument('fatigue');
    const responses = Object.fromEntries(fatigue.questionIds.map((id) => [fatigue.externalKeys[id], 4]));
    const result = toSurveyResult(engine.evaluate('fatigue', { userId: 'user-9', responses }));

    expect(result).toMatchObject({
      instrument: 'fatigue',
      userId: 'user-9',
      totalSum: 68,
      label: { mn: 'Хүнд зэргийн архаг ядаргаатай', en: 'severe chronic fatigue' },
    });
    expect(Object.values(result.responses).reduce((sum, value) => sum + value, 0)).toBe(result.totalSum);
  });
});
