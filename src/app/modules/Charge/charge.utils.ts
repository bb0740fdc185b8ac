import httpStatus from 'http-status';
import {
  CARD_DECLINED_STRIPE_ERROR,
  CHARGE_MESSAGES,
  TRANSIENT_STRIPE_ERRORS,
} from './charge.constant';
import {
  IProcessorErrorBody,
  PROCESSOR_ERROR_FIELDS,
  TFailedChargeOutcome,
} from './charge.interface';
import { INotificationContent } from '../Notification/notification.interface';

interface IStripeErrorLike {
  type: string;
  message: string;
}

const readString = (source: object, key: string): string | undefined => {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
};

const readNumber = (source: object, key: string): number | undefined => {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'number' ? value : undefined;
};

// Stripe SDK errors all carry a `type` naming their class, e.g. 'StripeCardError'.
const isStripeError = (error: unknown): error is object & IStripeErrorLike =>
  typeof error === 'object' &&
  error !== null &&
  'type' in error &&
  typeof error.type === 'string' &&
  error.type.startsWith('Stripe') &&
  'message' in error &&
  typeof error.message === 'string';

// Keys the SDK adds to `raw` next to the response's error object.
const SDK_RAW_KEYS: readonly string[] = ['headers', 'statusCode', 'requestId'];

const isTransient = (type: string) =>
  TRANSIENT_STRIPE_ERRORS.some((transientType) => transientType === type);

/**
 * Smallest currency unit to major unit, rounded to 2 places.
 * Only used for log and notification text; a non-numeric amount reads as 0.
 */
export const toDisplayAmount = (amount: string): number => {
  const parsed = Number.parseFloat(amount);
  if (!Number.isFinite(parsed)) {
    return 0;
  }
  return Number((parsed / 100).toFixed(2));
};

/**
 * Amount as sent to the processor. Only plain digit strings become numbers;
 * anything else is passed as NaN, which Stripe rejects as an invalid integer.
 */
export const toChargeAmount = (amount: string): number =>
  /^\d+$/.test(amount) ? Number(amount) : Number.NaN;

export const formatDisplayAmount = (amount: number, currency: string) =>
  `$${amount.toFixed(2)} ${currency.toUpperCase()}`;

const fallbackType = (error: IStripeErrorLike) =>
  error.type === 'StripeConnectionError' ? 'api_connection_error' : 'api_error';

const buildErrorBody = (
  error: object & IStripeErrorLike
): IProcessorErrorBody => {
  const raw: unknown = Reflect.get(error, 'raw');

  if (typeof raw === 'object' && raw !== null) {
    const body: IProcessorErrorBody = {
      type: readString(raw, 'type') ?? fallbackType(error),
      message: readString(raw, 'message') ?? error.message,
    };
    for (const field of Object.keys(raw)) {
      const value: unknown = Reflect.get(raw, field);
      if (
        SDK_RAW_KEYS.includes(field) ||
        value === undefined ||
        value instanceof Error ||
        field in body
      ) {
        continue;
      }
      body[field] = value;
    }
    return body;
  }

  const body: IProcessorErrorBody = {
    type: readString(error, 'rawType') ?? fallbackType(error),
    message: error.message,
  };
  for (const field of PROCESSOR_ERROR_FIELDS) {
    const value = readString(error, field);
    if (value !== undefined) {
      body[field] = value;
    }
  }

  return body;
};

/**
 * Maps whatever the charge call rejected with onto a failed outcome.
 * Decisions are made on the error's `type` discriminant alone.
 */
export const classifyChargeError = (error: unknown): TFailedChargeOutcome => {
  if (!isStripeError(error)) {
    return {
      kind: 'processor_error',
      statusCode: httpStatus.INTERNAL_SERVER_ERROR,
      error: {
        type: 'api_error',
        message: 'An unexpected error occurred while processing the charge.',
      },
      detail: error instanceof Error ? error.message : String(error),
    };
  }

  const transient = isTransient(error.type);
  const reportedStatus = readNumber(error, 'statusCode');
  const statusCode =
    reportedStatus ??
    (transient ? httpStatus.BAD_GATEWAY : httpStatus.INTERNAL_SERVER_ERROR);
  const failure = {
    statusCode,
    error: buildErrorBody(error),
    detail:
      reportedStatus === undefined
        ? `${error.type}: ${error.message}`
        : `${error.type} (Status ${reportedStatus}): ${error.message}`,
  };

  if (error.type === CARD_DECLINED_STRIPE_ERROR) {
    return { kind: 'card_declined', ...failure };
  }
  if (transient) {
    return { kind: 'transient_error', ...failure };
  }
  return { kind: 'processor_error', ...failure };
};

export const buildSuccessContent = (
  amountLabel: string,
  email: string
): INotificationContent => ({
  email: {
    subject: CHARGE_MESSAGES.SUCCESS_EMAIL_SUBJECT,
    body: `Hey, just letting you know that you just got a donation of ${amountLabel} from ${email}!`,
  },
  push: {
    subject: CHARGE_MESSAGES.SUCCESS_PUSH_TITLE,
    body: `You just received a donation of ${amountLabel} from ${email}!`,
  },
});

export const buildFailureContent = (detail: string): INotificationContent => {
  const body = `Your donation server just had an error! ${detail}`;

  return {
    email: { subject: CHARGE_MESSAGES.FAILURE_EMAIL_SUBJECT, body },
    push: { subject: CHARGE_MESSAGES.FAILURE_PUSH_TITLE, body },
  };
};
