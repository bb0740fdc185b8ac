import { NOTIFICATION_CHANNEL, NOTIFICATION_KIND } from './notification.constant';

export type TNotificationChannel =
  (typeof NOTIFICATION_CHANNEL)[keyof typeof NOTIFICATION_CHANNEL];

export type TNotificationKind =
  (typeof NOTIFICATION_KIND)[keyof typeof NOTIFICATION_KIND];

export interface INotificationEvent {
  channel: TNotificationChannel;
  kind: TNotificationKind;
  subject: string;
  body: string;
}

export interface INotificationMessage {
  subject: string;
  body: string;
}

// One message per channel for a single outcome.
export interface INotificationContent {
  email: INotificationMessage;
  push: INotificationMessage;
}

export interface IEmailMessage {
  subject: string;
  text: string;
}

export interface IEmailSender {
  send(message: IEmailMessage): Promise<void>;
}

export interface IPushMessage {
  title: string;
  message: string;
}

export interface IPushSender {
  send(message: IPushMessage): Promise<void>;
}

export interface INotificationResult {
  email: boolean;
  push: boolean;
}
