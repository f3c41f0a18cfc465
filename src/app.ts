import cors from 'cors';
import express, { Express } from 'express';
import morgan from 'morgan';
import helmet from 'helmet';
import { AppConfig } from './config';
import { errorHandler, notFound } from './middleware/errorHandler';
import { SurveyEngine } from './modules/surveys/engine';
import { InstrumentRegistry } from './modules/surveys/registry';
import { SurveyService } from './modules/surveys/service';
import { ResultStore } from './modules/surveys/store';
import { UserService } from './modules/users/service';
import { UserStore } from './modules/users/store';
import { createRoutes } from './routes';

export type AppDependencies = {
  config: AppConfig;
  registry: InstrumentRegistry;
  userStore: UserStore;
  resultStore: ResultStore;
};

export function createApp({ config, registry, userStore, resultStore }: AppDependencies): Express {
  const app = express();

  app.use(
    cors({
      origin: config.corsOrigins,
      credentials: true,
    })
  );
  app.use(helmet());
  app.use(express.json());
  if (config.nodeEnv !== 'test') {
    app.use(morgan('dev'));
  }

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: 'survey-intake', timestamp: new Date().toISOString() });
  });

  const users = new UserService(userStore);
  const surveys = new SurveyService(new SurveyEngine(registry), resultStore, userStore);
  app.use('/api', createRoutes({ config, registry, users, surveys }));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
