import { IConfig } from '../../config';

export const isEmailConfigured = (mailgun: IConfig['mailgun']) =>
  Boolean(mailgun.apiKey && mailgun.domain && mailgun.from && mailgun.to);

export const isPushConfigured = (pushover: IConfig['pushover']) =>
  Boolean(pushover.userKey && pushover.appToken);
