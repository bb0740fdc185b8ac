/* eslint-disable no-console */

export interface ILogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

const timestamp = () => new Date().toISOString();

export const Logger: ILogger = {
  info: (message) => console.log(`[${timestamp()}] INFO  ${message}`),
  warn: (message) => console.warn(`[${timestamp()}] WARN  ${message}`),
  error: (message, error) => {
    if (error === undefined) {
      console.error(`[${timestamp()}] ERROR ${message}`);
    } else {
      console.error(`[${timestamp()}] ERROR ${message}`, error);
    }
  },
};
