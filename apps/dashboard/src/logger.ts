import pino, { type DestinationStream, type Logger } from 'pino';
import type { DashboardConfig } from './config.js';

/**
 * JSON lines with the service name, an ISO `ts`, the level label and `message`.
 * Level and service come from `readDashboardConfig`.
 */
export function createDashboardLogger(logging: DashboardConfig['logging'], destination?: DestinationStream): Logger {
  const options = {
    level: logging.level,
    base: { service: logging.service },
    timestamp: () => `,"ts":"${new Date().toISOString()}"`,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    messageKey: 'message',
  };

  return destination ? pino(options, destination) : pino(options);
}
