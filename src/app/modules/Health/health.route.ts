import { Request, Response, Router } from 'express';
import httpStatus from 'http-status';
import { ILogger } from '../../utils/logger';

export const createHealthRoutes = (logger: ILogger) => {
  const router = Router();

  router.get('/ping', (_req: Request, res: Response) => {
    logger.info('Ping received.');
    res.status(httpStatus.OK).end();
  });

  return router;
};
