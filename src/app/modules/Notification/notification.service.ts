import { IConfig } from '../../config';
import { ILogger, Logger } from '../../utils/logger';
import { NOTIFICATION_CHANNEL, NOTIFICATION_KIND } from './notification.constant';
import {
  IEmailSender,
  INotificationContent,
  INotificationEvent,
  INotificationResult,
  IPushSender,
  TNotificationKind,
} from './notification.interface';
import { isEmailConfigured, isPushConfigured } from './notification.utils';

interface INotificationServiceDeps {
  config: Pick<IConfig, 'mailgun' | 'pushover'>;
  emailSender: IEmailSender;
  pushSender: IPushSender;
  logger?: ILogger;
}

export const createNotificationService = ({
  config,
  emailSender,
  pushSender,
  logger = Logger,
}: INotificationServiceDeps) => {
  const { mailgun, pushover } = config;

  const isEnabled = (event: INotificationEvent) => {
    const isSuccess = event.kind === NOTIFICATION_KIND.SUCCESS;

    if (event.channel === NOTIFICATION_CHANNEL.EMAIL) {
      return (
        isEmailConfigured(mailgun) &&
        (isSuccess ? mailgun.onSuccess : mailgun.onFailure)
      );
    }

    return (
      isPushConfigured(pushover) &&
      (isSuccess ? pushover.onSuccess : pushover.onFailure)
    );
  };

  // 1. Send a single event; resolves to whether it was delivered
  const dispatch = async (event: INotificationEvent): Promise<boolean> => {
    if (!isEnabled(event)) {
      return false;
    }

    try {
      if (event.channel === NOTIFICATION_CHANNEL.EMAIL) {
        logger.info(`Sending an email to ${mailgun.to}...`);
        await emailSender.send({ subject: event.subject, text: event.body });
      } else {
        logger.info('Sending a push notification...');
        await pushSender.send({ title: event.subject, message: event.body });
      }
      return true;
    } catch (error) {
      logger.error(
        `Could not deliver ${event.kind} ${event.channel} notification`,
        error
      );
      return false;
    }
  };

  // 2. Email and push for one outcome, in parallel
  const notifyAll = async (
    kind: TNotificationKind,
    content: INotificationContent
  ): Promise<INotificationResult> => {
    const [email, push] = await Promise.all([
      dispatch({
        channel: NOTIFICATION_CHANNEL.EMAIL,
        kind,
        subject: content.email.subject,
        body: content.email.body,
      }),
      dispatch({
        channel: NOTIFICATION_CHANNEL.PUSH,
        kind,
        subject: content.push.subject,
        body: content.push.body,
      }),
    ]);

    return { email, push };
  };

  return { dispatch, notifyAll };
};

export type TNotificationService = ReturnType<typeof createNotificationService>;
