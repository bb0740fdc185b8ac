import { Router } from 'express';
import { IAppContext } from '../types';
import { createChargeRoutes } from '../modules/Charge/charge.route';
import { createHealthRoutes } from '../modules/Health/health.route';
import { createPublicKeyRoutes } from '../modules/PublicKey/pubkey.route';

export const createRoutes = ({ config, chargeService, logger }: IAppContext) => {
  const router = Router();

  const moduleRoutes = [
    {
      path: '/',
      route: createPublicKeyRoutes(config),
    },
    {
      path: '/',
      route: createHealthRoutes(logger),
    },
    {
      path: '/',
      route: createChargeRoutes(config, chargeService),
    },
  ];

  moduleRoutes.forEach((route) => router.use(route.path, route.route));

  return router;
};
