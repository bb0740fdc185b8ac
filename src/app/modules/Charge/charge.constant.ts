export const STRIPE_CURRENCY = {
  USD: 'usd',
  EUR: 'eur',
  GBP: 'gbp',
  AUD: 'aud',
  CAD: 'cad',
} as const;

export type TStripeCurrency =
  (typeof STRIPE_CURRENCY)[keyof typeof STRIPE_CURRENCY];

export const DEFAULT_CURRENCY: TStripeCurrency = STRIPE_CURRENCY.USD;

// Stripe error `type` values that point at connectivity or credentials
// rather than the request itself.
export const TRANSIENT_STRIPE_ERRORS = [
  'StripeConnectionError',
  'StripeAuthenticationError',
  'StripeRateLimitError',
] as const;

export const CARD_DECLINED_STRIPE_ERROR = 'StripeCardError';

export const CHARGE_MESSAGES = {
  SUCCESS_EMAIL_SUBJECT: 'You just got a donation!',
  SUCCESS_PUSH_TITLE: 'Awesome news',
  FAILURE_EMAIL_SUBJECT: 'Whoops!',
  FAILURE_PUSH_TITLE: 'Uh oh!',
} as const;
