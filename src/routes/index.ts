import { Router } from 'express';
import { AppConfig } from '../config';
import { InstrumentRegistry } from '../modules/surveys/registry';
import { createSurveysRouter } from '../modules/surveys/routes';
import { SurveyService } from '../modules/surveys/service';
import { createUsersRouter } from '../modules/users/routes';
import { UserService } from '../modules/users/service';

export function createRoutes(deps: {
  config: AppConfig;
  registry: InstrumentRegistry;
  users: UserService;
  surveys: SurveyService;
}): Router {
  const router = Router();

  router.use('/users', createUsersRouter(deps.users));
  router.use('/surveys', createSurveysRouter(deps));

  return router;
}
