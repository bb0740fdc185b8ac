import { Request, Response, Router } from 'express';
import cors from 'cors';
import { IConfig } from '../../config';
import { buildPublicKeyScript } from './pubkey.utils';

export const createPublicKeyRoutes = (
  config: Pick<IConfig, 'cors' | 'stripe' | 'publicKeyVariableName'>
) => {
  const router = Router();
  const allowOrigin = cors({ origin: config.cors.acceptDomain });
  const script = buildPublicKeyScript(
    config.publicKeyVariableName,
    config.stripe.publicKey
  );

  router.options('/pubkey.js', allowOrigin);

  // Exposes the publishable key to checkout pages as a global variable
  router.get('/pubkey.js', allowOrigin, (_req: Request, res: Response) => {
    res.type('text/javascript').send(script);
  });

  return router;
};
