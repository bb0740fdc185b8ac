export const NOTIFICATION_CHANNEL = {
  EMAIL: 'email',
  PUSH: 'push',
} as const;

export const NOTIFICATION_KIND = {
  SUCCESS: 'success',
  FAILURE: 'failure',
} as const;

export const PUSHOVER_API_URL = 'https://api.pushover.net/1/messages.json';

// Every push links back to the processor dashboard.
export const PUSH_DASHBOARD_LINK = {
  URL: 'https://dashboard.stripe.com',
  TITLE: 'Visit your Stripe Dashboard',
} as const;
