import Stripe from 'stripe';
import { IConfig } from '../config';

// No automatic retries: each donation is attempted exactly once.
export const createStripeClient = (stripeConfig: IConfig['stripe']) =>
  new Stripe(stripeConfig.secretKey, {
    maxNetworkRetries: 0,
    timeout: stripeConfig.timeoutMs,
  });
