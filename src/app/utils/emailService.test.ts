import { describe, expect, it, vi } from 'vitest';
import { loadConfig } from '../config';
import { createEmailSender } from './emailService';

const { sendMail } = vi.hoisted(() => ({ sendMail: vi.fn() }));

vi.mock('nodemailer', () => ({
  default: {
    createTransport: vi.fn(() => ({ sendMail })),
  },
}));

const mailgunConfig = (env: NodeJS.ProcessEnv = {}) =>
  loadConfig({
    STRIPE_KEYS: 'pk_test_XXX:sk_test_YYY',
    MAILGUN_API_KEY: 'test-mailgun-key',
    MAILGUN_DOMAIN: 'mg.example.org',
    MAILGUN_FROM_ADDR: 'server@example.org',
    MAILGUN_TO_ADDR: 'owner@example.org',
    ...env,
  }).mailgun;

describe('createEmailSender', () => {
  it('sends from and to the configured addresses', async () => {
    sendMail.mockResolvedValue({ messageId: 'test-message' });
    const sender = createEmailSender(mailgunConfig());

    await sender.send({ subject: 'Whoops!', text: 'down' });

    expect(sendMail).toHaveBeenCalledWith({
      from: 'server@example.org',
      to: 'owner@example.org',
      subject: 'Whoops!',
      text: 'down',
    });
  });

  it('wraps provider failures', async () => {
    sendMail.mockRejectedValue(new Error('401 Unauthorized'));
    const sender = createEmailSender(mailgunConfig());

    await expect(sender.send({ subject: 's', text: 't' })).rejects.toThrow(
      'Failed to send notification email: 401 Unauthorized'
    );
  });

  it('refuses to send with incomplete credentials', async () => {
    const sender = createEmailSender(
      mailgunConfig({ MAILGUN_DOMAIN: undefined })
    );

    await expect(sender.send({ subject: 's', text: 't' })).rejects.toThrow(
      'Mailgun credentials are not configured'
    );
    expect(sendMail).not.toHaveBeenCalled();
  });
});
