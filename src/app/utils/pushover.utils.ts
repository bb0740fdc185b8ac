import axios from 'axios';
import { IConfig } from '../config';
import {
  PUSH_DASHBOARD_LINK,
  PUSHOVER_API_URL,
} from '../modules/Notification/notification.constant';
import {
  IPushMessage,
  IPushSender,
} from '../modules/Notification/notification.interface';

/**
 * Sends a push notification through the Pushover messages API.
 * The message targets `device` when one is configured, otherwise every
 * device registered to the user key.
 */
export const createPushSender = (
  pushover: IConfig['pushover']
): IPushSender => {
  const send = async ({ title, message }: IPushMessage): Promise<void> => {
    const { userKey, appToken, device, timeoutMs } = pushover;
    if (!userKey || !appToken) {
      throw new Error('Pushover credentials are not configured');
    }

    const form = new URLSearchParams({
      token: appToken,
      user: userKey,
      title,
      message,
      url: PUSH_DASHBOARD_LINK.URL,
      url_title: PUSH_DASHBOARD_LINK.TITLE,
    });
    if (device) {
      form.set('device', device);
    }

    try {
      await axios.post(PUSHOVER_API_URL, form, { timeout: timeoutMs });
    } catch (error) {
      let reason = 'Unknown error';
      if (axios.isAxiosError(error)) {
        reason = error.response
          ? `HTTP ${error.response.status}`
          : error.message;
      } else if (error instanceof Error) {
        reason = error.message;
      }
      throw new Error(`Failed to send push notification: ${reason}`);
    }
  };

  return { send };
};
