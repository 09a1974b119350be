import { pino, stdTimeFunctions, type DestinationStream, type LevelWithSilent, type Logger } from 'pino';

export const SERVICE_NAME = 'lambda-authorizer';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/**
 * Root logger for the function. The raw authorization header is removed from
 * anything that gets logged under `event`.
 */
export const createLogger = (level: LevelWithSilent, destination?: DestinationStream): Logger => {
  const options = {
    level,
    base: { service: SERVICE_NAME },
    timestamp: stdTimeFunctions.isoTime,
    redact: { remove: true, paths: ['event.authorizationToken', 'authorizationToken'] },
  };
  return destination === undefined ? pino(options) : pino(options, destination);
};
