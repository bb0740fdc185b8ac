import Stripe from 'stripe';

export interface IDonationRequest {
  amount: string;
  token: string;
  email: string;
}

export const PROCESSOR_ERROR_FIELDS = [
  'code',
  'decline_code',
  'param',
  'charge',
  'doc_url',
] as const;

// The `error` object of a Stripe error response, as relayed to the caller.
export interface IProcessorErrorBody {
  type: string;
  message: string;
  code?: string;
  decline_code?: string;
  param?: string;
  [field: string]: unknown;
}

interface IFailedCharge {
  statusCode: number;
  error: IProcessorErrorBody;
  detail: string;
}

export type TChargeOutcome =
  | { kind: 'success'; chargeId: string }
  | ({ kind: 'card_declined' } & IFailedCharge)
  | ({ kind: 'processor_error' } & IFailedCharge)
  | ({ kind: 'transient_error' } & IFailedCharge);

export type TFailedChargeOutcome = Exclude<TChargeOutcome, { kind: 'success' }>;

export interface IChargeResult {
  statusCode: number;
  body: IProcessorErrorBody | null;
}

// The slice of `stripe.charges` the charge flow calls.
export interface IChargeCreator {
  create(params: Stripe.ChargeCreateParams): Promise<{ id: string }>;
}
