import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors';
import {
  DEFAULT_CURRENCY,
  STRIPE_CURRENCY,
  TStripeCurrency,
} from '../modules/Charge/charge.constant';

dotenv.config({
  path: path.join(process.cwd(), '.env'),
});

export interface IConfig {
  readonly port: number;
  readonly nodeEnv: string;
  readonly host: string;
  readonly stripe: {
    readonly publicKey: string;
    readonly secretKey: string;
    readonly chargeDescription?: string;
    readonly currency: TStripeCurrency;
    readonly timeoutMs: number;
  };
  readonly cors: {
    readonly acceptDomain: string;
  };
  readonly publicKeyVariableName: string;
  readonly mailgun: {
    readonly apiKey?: string;
    readonly domain?: string;
    readonly from?: string;
    readonly to?: string;
    readonly onSuccess: boolean;
    readonly onFailure: boolean;
    readonly timeoutMs: number;
  };
  readonly pushover: {
    readonly userKey?: string;
    readonly appToken?: string;
    readonly device?: string;
    readonly onSuccess: boolean;
    readonly onFailure: boolean;
    readonly timeoutMs: number;
  };
}

const PUBLIC_KEY_PREFIXES = ['pk_test', 'pk_live'];
const SECRET_KEY_PREFIXES = ['sk_test', 'sk_live'];

// An empty variable counts as unset.
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(
  blankToUndefined,
  z.string().trim().optional()
);

const stringWithDefault = (fallback: string) =>
  z.preprocess(blankToUndefined, z.string().trim().default(fallback));

const toggle = (fallback: '0' | '1') =>
  z.preprocess(
    blankToUndefined,
    z
      .enum(['0', '1', 'true', 'false'], {
        error: 'must be one of 0, 1, true or false',
      })
      .default(fallback)
      .transform((value) => value === '1' || value === 'true')
  );

const positiveInt = (fallback: number) =>
  z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ error: 'must be a number' })
      .int({ error: 'must be an integer' })
      .positive({ error: 'must be positive' })
      .default(fallback)
  );

const hasPrefix = (value: string, prefixes: string[]) =>
  prefixes.some((prefix) => value.startsWith(prefix));

const stripeKeysSchema = z
  .string({ error: 'must be set' })
  .transform((value, ctx) => {
    const parts = value.split(':');

    if (parts.length !== 2) {
      ctx.addIssue({
        code: 'custom',
        message: "must be of the form '<PUBKEY>:<SECRETKEY>'",
      });
      return z.NEVER;
    }

    const [publicKey, secretKey] = parts;

    if (!hasPrefix(publicKey, PUBLIC_KEY_PREFIXES)) {
      ctx.addIssue({
        code: 'custom',
        message: "public key must start with 'pk_test' or 'pk_live'",
      });
    }
    if (!hasPrefix(secretKey, SECRET_KEY_PREFIXES)) {
      ctx.addIssue({
        code: 'custom',
        message: "secret key must start with 'sk_test' or 'sk_live'",
      });
    }

    return { publicKey, secretKey };
  });

const envSchema = z.object({
  STRIPE_KEYS: stripeKeysSchema,
  STRIPE_CHARGE_DESC: optionalString,
  STRIPE_CURRENCY: z.preprocess(
    (value) =>
      typeof blankToUndefined(value) === 'string'
        ? String(value).toLowerCase()
        : undefined,
    z
      .enum(STRIPE_CURRENCY, {
        error: `must be one of ${Object.values(STRIPE_CURRENCY).join(', ')}`,
      })
      .default(DEFAULT_CURRENCY)
  ),
  STRIPE_TIMEOUT_MS: positiveInt(20_000),

  CORS_ACCEPT_DOMAIN: stringWithDefault('*'),
  JAVASCRIPT_PUBKEY_NAME: z.preprocess(
    blankToUndefined,
    z
      .string()
      .regex(/^[A-Za-z_$][\w$]*$/, {
        error: 'must be a valid JavaScript identifier',
      })
      .default('stripe_pubkey')
  ),

  MAILGUN_API_KEY: optionalString,
  MAILGUN_DOMAIN: optionalString,
  MAILGUN_FROM_ADDR: optionalString,
  MAILGUN_TO_ADDR: optionalString,
  MAIL_ON_SUCCESS: toggle('0'),
  MAIL_ON_FAILURE: toggle('1'),

  PUSHOVER_USER_KEY: optionalString,
  PUSHOVER_APP_TOKEN: optionalString,
  PUSHOVER_DEVICE: optionalString,
  PUSH_ON_SUCCESS: toggle('0'),
  PUSH_ON_FAILURE: toggle('1'),

  NOTIFICATION_TIMEOUT_MS: positiveInt(10_000),

  PORT: positiveInt(5001),
  HOST: stringWithDefault('localhost'),
  NODE_ENV: stringWithDefault('development'),
});

const formatIssue = (issue: {
  path: ReadonlyArray<PropertyKey>;
  message: string;
}) =>
  issue.path.length
    ? `${issue.path.map(String).join('.')} ${issue.message}`
    : issue.message;

/**
 * Resolves every recognised environment variable into an immutable config.
 *
 * @throws ConfigurationError listing each invalid or missing variable.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): IConfig => {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map(formatIssue));
  }

  const vars = parsed.data;

  return Object.freeze({
    port: vars.PORT,
    nodeEnv: vars.NODE_ENV,
    host: vars.HOST,
    stripe: Object.freeze({
      publicKey: vars.STRIPE_KEYS.publicKey,
      secretKey: vars.STRIPE_KEYS.secretKey,
      chargeDescription: vars.STRIPE_CHARGE_DESC,
      currency: vars.STRIPE_CURRENCY,
      timeoutMs: vars.STRIPE_TIMEOUT_MS,
    }),
    cors: Object.freeze({
      acceptDomain: vars.CORS_ACCEPT_DOMAIN,
    }),
    publicKeyVariableName: vars.JAVASCRIPT_PUBKEY_NAME,
    mailgun: Object.freeze({
      apiKey: vars.MAILGUN_API_KEY,
      domain: vars.MAILGUN_DOMAIN,
      from: vars.MAILGUN_FROM_ADDR,
      to: vars.MAILGUN_TO_ADDR,
      onSuccess: vars.MAIL_ON_SUCCESS,
      onFailure: vars.MAIL_ON_FAILURE,
      timeoutMs: vars.NOTIFICATION_TIMEOUT_MS,
    }),
    pushover: Object.freeze({
      userKey: vars.PUSHOVER_USER_KEY,
      appToken: vars.PUSHOVER_APP_TOKEN,
      device: vars.PUSHOVER_DEVICE,
      onSuccess: vars.PUSH_ON_SUCCESS,
      onFailure: vars.PUSH_ON_FAILURE,
      timeoutMs: vars.NOTIFICATION_TIMEOUT_MS,
    }),
  });
};
