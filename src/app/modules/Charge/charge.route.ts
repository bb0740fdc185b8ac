import express, { Router } from 'express';
import cors from 'cors';
import { IConfig } from '../../config';
import { createChargeController } from './charge.controller';
import { TChargeService } from './charge.service';

export const createChargeRoutes = (
  config: Pick<IConfig, 'cors'>,
  chargeService: TChargeService
) => {
  const router = Router();
  const ChargeController = createChargeController(chargeService);
  const allowOrigin = cors({ origin: config.cors.acceptDomain });

  // Preflight for cross-origin JSON posts
  router.options('/charge', allowOrigin);

  // CORS runs ahead of the parsers so a malformed body still carries the header
  router.post(
    '/charge',
    allowOrigin,
    express.json(),
    express.urlencoded({ extended: true }),
    ChargeController.createCharge
  );

  return router;
};
