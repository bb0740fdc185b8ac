import { Server } from 'http';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createApp } from './app';
import { loadConfig } from './app/config';
import { IChargeCreator } from './app/modules/Charge/charge.interface';
import { createChargeService } from './app/modules/Charge/charge.service';
import {
  IEmailSender,
  IPushSender,
} from './app/modules/Notification/notification.interface';
import { createNotificationService } from './app/modules/Notification/notification.service';

const BASE_ENV = {
  STRIPE_KEYS: 'pk_test_XXX:sk_test_YYY',
  NODE_ENV: 'test',
};

let server: Server | null = null;

const start = async (env: NodeJS.ProcessEnv = {}) => {
  const config = loadConfig({ ...BASE_ENV, ...env });
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const create = vi.fn<IChargeCreator['create']>();
  const emailSend = vi.fn<IEmailSender['send']>().mockResolvedValue(undefined);
  const pushSend = vi.fn<IPushSender['send']>().mockResolvedValue(undefined);

  const notifications = createNotificationService({
    config,
    emailSender: { send: emailSend },
    pushSender: { send: pushSend },
    logger,
  });
  const chargeService = createChargeService({
    config,
    charges: { create },
    notifications,
    logger,
  });
  const app = createApp({ config, chargeService, logger });

  const running = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  server = running;

  const address = running.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server did not bind to a TCP port');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    create,
    emailSend,
    pushSend,
    logger,
  };
};

afterEach(async () => {
  const running = server;
  server = null;
  if (running) {
    await new Promise<void>((resolve, reject) => {
      running.close((err) => (err ? reject(err) : resolve()));
    });
  }
});

const donationForm = () =>
  new URLSearchParams({
    amount: '500',
    token: 'tok_visa',
    email: 'donor@example.com',
  });

describe('GET /pubkey.js', () => {
  it('exposes the public key under the default variable name', async () => {
    const { baseUrl } = await start();

    const res = await fetch(`${baseUrl}/pubkey.js`);

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('var stripe_pubkey = "pk_test_XXX";');
    expect(res.headers.get('content-type')).toMatch(/^text\/javascript/);
    expect(res.headers.get('access-control-allow-origin')).toBe('*');
  });

  it('uses the configured variable name and origin', async () => {
    const { baseUrl } = await start({
      JAVASCRIPT_PUBKEY_NAME: 'donationKey',
      CORS_ACCEPT_DOMAIN: 'https://donate.example.org',
    });

    const res = await fetch(`${baseUrl}/pubkey.js`);

    expect(await res.text()).toBe('var donationKey = "pk_test_XXX";');
    expect(res.headers.get('access-control-allow-origin')).toBe(
      'https://donate.example.org'
    );
  });
});

describe('GET /ping', () => {
  it('answers 200 with an empty body and logs it', async () => {
    const { baseUrl, logger } = await start();

    const res = await fetch(`${baseUrl}/ping`);

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('');
    expect(logger.info).toHaveBeenCalledWith('Ping received.');
  });
});

describe('POST /charge', () => {
  it('charges form fields and answers 200 with an empty body', async () => {
    const { baseUrl, create } = await start();
    create.mockResolvedValue({ id: 'ch_test_1' });

    const res = await fetch(`${baseUrl}/charge`, {
      method: 'POST',
      body: donationForm(),
    });

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('');
    expect(res.headers.get('access-control-allow-origin')).toBe('*');
    expect(create).toHaveBeenCalledWith({
      amount: 500,
      currency: 'usd',
      source: 'tok_visa',
      receipt_email: 'donor@example.com',
      description: undefined,
    });
  });

  it('accepts JSON bodies with a numeric amount', async () => {
    const { baseUrl, create } = await start();
    create.mockResolvedValue({ id: 'ch_test_2' });

    const res = await fetch(`${baseUrl}/charge`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({
        amount: 2500,
        token: 'tok_visa',
        email: 'donor@example.com',
      }),
    });

    expect(res.status).toBe(200);
    expect(create.mock.calls[0][0].amount).toBe(2500);
  });

  it("returns the processor's decline status and error body", async () => {
    const { baseUrl, create, emailSend, pushSend } = await start({
      MAILGUN_API_KEY: 'test-mailgun-key',
      MAILGUN_DOMAIN: 'mg.example.org',
      MAILGUN_FROM_ADDR: 'server@example.org',
      MAILGUN_TO_ADDR: 'owner@example.org',
      PUSHOVER_USER_KEY: 'test-user-key',
      PUSHOVER_APP_TOKEN: 'test-app-token',
    });
    create.mockRejectedValue({
      type: 'StripeCardError',
      rawType: 'card_error',
      message: 'Your card was declined.',
      statusCode: 402,
      code: 'card_declined',
      decline_code: 'generic_decline',
    });

    const res = await fetch(`${baseUrl}/charge`, {
      method: 'POST',
      body: donationForm(),
    });

    expect(res.status).toBe(402);
    expect(res.headers.get('access-control-allow-origin')).toBe('*');
    expect(await res.json()).toEqual({
      type: 'card_error',
      message: 'Your card was declined.',
      code: 'card_declined',
      decline_code: 'generic_decline',
    });
    expect(emailSend).not.toHaveBeenCalled();
    expect(pushSend).not.toHaveBeenCalled();
  });

  it('keeps the response when the push provider is down', async () => {
    const { baseUrl, create, pushSend } = await start({
      PUSHOVER_USER_KEY: 'test-user-key',
      PUSHOVER_APP_TOKEN: 'test-app-token',
    });
    pushSend.mockRejectedValue(new Error('Pushover unreachable'));
    create.mockRejectedValue({
      type: 'StripeAPIError',
      rawType: 'api_error',
      message: 'Something broke',
      statusCode: 500,
    });

    const res = await fetch(`${baseUrl}/charge`, {
      method: 'POST',
      body: donationForm(),
    });

    expect(pushSend).toHaveBeenCalledTimes(1);
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      type: 'api_error',
      message: 'Something broke',
    });
  });

  it('rejects a malformed JSON body with the CORS header set', async () => {
    const { baseUrl, create } = await start();

    const res = await fetch(`${baseUrl}/charge`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"amount":',
    });

    expect(res.status).toBe(400);
    expect(res.headers.get('access-control-allow-origin')).toBe('*');
    expect(await res.json()).toMatchObject({ success: false, statusCode: 400 });
    expect(create).not.toHaveBeenCalled();
  });

  it('flattens nested form fields and lets the processor reject them', async () => {
    const { baseUrl, create } = await start();
    create.mockRejectedValue({
      type: 'StripeInvalidRequestError',
      rawType: 'invalid_request_error',
      message: 'Invalid integer: NaN',
      statusCode: 400,
      param: 'amount',
    });

    const res = await fetch(`${baseUrl}/charge`, {
      method: 'POST',
      body: new URLSearchParams({
        'amount[x]': '1',
        token: 'tok_visa',
        email: 'donor@example.com',
      }),
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      type: 'invalid_request_error',
      message: 'Invalid integer: NaN',
      param: 'amount',
    });
    expect(create.mock.calls[0][0].amount).toBeNaN();
  });

  it('answers CORS preflight with the configured origin', async () => {
    const { baseUrl } = await start({
      CORS_ACCEPT_DOMAIN: 'https://donate.example.org',
    });

    const res = await fetch(`${baseUrl}/charge`, { method: 'OPTIONS' });

    expect(res.status).toBe(204);
    expect(res.headers.get('access-control-allow-origin')).toBe(
      'https://donate.example.org'
    );
  });
});

describe('unknown routes', () => {
  it('answer 404 with a JSON error', async () => {
    const { baseUrl } = await start();

    const res = await fetch(`${baseUrl}/nope`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      success: false,
      message: 'API not found!',
      error: {
        path: '/nope',
        message: 'Cannot GET /nope',
      },
    });
  });
});
