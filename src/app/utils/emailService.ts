import nodemailer from 'nodemailer';
import mailgunTransport from 'nodemailer-mailgun-transport';
import { IConfig } from '../config';
import {
  IEmailMessage,
  IEmailSender,
} from '../modules/Notification/notification.interface';
import { withTimeout } from './withTimeout';

// Create email transporter
const createTransporter = (apiKey: string, domain: string) => {
  return nodemailer.createTransport(
    mailgunTransport({
      auth: {
        api_key: apiKey,
        domain,
      },
    })
  );
};

export const createEmailSender = (
  mailgun: IConfig['mailgun']
): IEmailSender => {
  const send = async ({ subject, text }: IEmailMessage): Promise<void> => {
    const { apiKey, domain, from, to } = mailgun;
    if (!apiKey || !domain || !from || !to) {
      throw new Error('Mailgun credentials are not configured');
    }

    try {
      const transporter = createTransporter(apiKey, domain);

      await withTimeout(
        transporter.sendMail({ from, to, subject, text }),
        mailgun.timeoutMs,
        'Mailgun send'
      );
    } catch (error) {
      throw new Error(
        `Failed to send notification email: ${
          error instanceof Error ? error.message : 'Unknown error'
        }`
      );
    }
  };

  return { send };
};
