/**
 * Channel-tagged logger. The gateway writes through this interface so
 * callers can route payment events wherever their app logs.
 */

export interface Logger {
  info(message: string, channel: string): void;
  error(message: string, channel: string): void;
}

export const consoleLogger: Logger = {
  info(message, channel) {
    console.log(`[${channel}] ${message}`);
  },
  error(message, channel) {
    console.error(`[${channel}] ${message}`);
  },
};
