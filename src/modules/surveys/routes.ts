import { Router } from 'express';
import { AppConfig } from '../../config';
import { AppError } from '../../errors';
import { InstrumentRegistry } from './registry';
import { localeQuerySchema, resultsQuerySchema, submissionSchema } from './schema';
import { SurveyService } from './service';
import { Instrument, Locale, SurveyResult } from './types';

export function createSurveysRouter(deps: {
  config: AppConfig;
  registry: InstrumentRegistry;
  surveys: SurveyService;
}): Router {
  const { config, registry, surveys } = deps;
  const router = Router();

  router.get('/', (req, res) => {
    const query = localeQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ error: 'INVALID_QUERY', message: 'Invalid query', details: query.error.flatten() });
    }
    return res.json({ data: registry.list().map(toInstrumentSummary) });
  });

  router.get('/:instrument', (req, res, next) => {
    const query = localeQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ error: 'INVALID_QUERY', message: 'Invalid query', details: query.error.flatten() });
    }
    try {
      const instrument = registry.get(req.params.instrument);
      return res.json({ data: toInstrumentDetail(instrument, query.data.lang ?? config.defaultLocale) });
    } catch (err) {
      return next(err);
    }
  });

  router.post('/:instrument', async (req, res, next) => {
    const query = localeQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ error: 'INVALID_QUERY', message: 'Invalid query', details: query.error.flatten() });
    }
    const parsed = submissionSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'INVALID_PAYLOAD', message: 'Invalid payload', details: parsed.error.flatten() });
    }

    try {
      const result = await surveys.submit(req.params.instrument, parsed.data);
      const locale = query.data.lang ?? config.defaultLocale;
      return res.status(201).json({
        data: {
          resultId: result.id,
          instrument: result.instrument,
          userId: result.userId,
          totalSum: result.totalSum,
          label: result.label[locale],
          submittedAt: result.createdAt,
        },
      });
    } catch (err) {
      return next(err);
    }
  });

  router.get('/:instrument/results', async (req, res, next) => {
    const query = resultsQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ error: 'INVALID_QUERY', message: 'Invalid query', details: query.error.flatten() });
    }

    try {
      const { userId, latestOnly, lang } = query.data;
      const locale = lang ?? config.defaultLocale;
      const results = await surveys.history(req.params.instrument, userId);
      if (results.length === 0) {
        throw new AppError('NO_RESULTS', 'No results found for this survey');
      }

      if (latestOnly) {
        return res.json({ data: toResultView(results[0], locale) });
      }
      return res.json({ data: results.map((result) => toResultView(result, locale)) });
    } catch (err) {
      return next(err);
    }
  });

  return router;
}

function toInstrumentSummary(instrument: Instrument) {
  return {
    name: instrument.name,
    title: instrument.title,
    questionCount: instrument.questionIds.length,
    responseRange: instrument.responseRange,
  };
}

function toInstrumentDetail(instrument: Instrument, locale: Locale) {
  return {
    ...toInstrumentSummary(instrument),
    questions: instrument.questionIds.map((id) => ({ id, key: instrument.externalKeys[id] })),
    bands: instrument.bands.map((band) => ({ low: band.low, high: band.high, label: band.label[locale] })),
  };
}

function toResultView(result: SurveyResult, locale: Locale) {
  return {
    resultId: result.id,
    instrument: result.instrument,
    userId: result.userId,
    totalSum: result.totalSum,
    label: result.label[locale],
    responses: result.responses,
    submittedAt: result.createdAt,
  };
}
