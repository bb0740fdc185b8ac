import express, { Application } from 'express';
import morgan from 'morgan';
import { createRoutes } from './app/routes';
import { IAppContext } from './app/types';
import { globalErrorHandler, notFoundHandler } from './app/utils';

export const createApp = (context: IAppContext): Application => {
  const { config, logger } = context;

  // app
  const app: Application = express();

  //logger
  if (config.nodeEnv !== 'test') {
    app.use(morgan('dev'));
  }

  // All routes
  app.use(createRoutes(context));

  // global error handler
  app.use(
    globalErrorHandler({
      exposeStack: config.nodeEnv === 'development',
      logger,
    })
  );

  // all not found handler
  app.use(notFoundHandler);

  return app;
};
