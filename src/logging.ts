import pino, { type Logger } from 'pino';
import { loadLoggingConfigFromEnv } from './server/config.js';

const { level } = loadLoggingConfigFromEnv();

// stdout belongs to the renderer; logs go to stderr
const destination = pino.destination({ dest: 2, sync: false });

export const logger: Logger = pino(
  {
    level,
    base: { app: 'cue-display' },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  destination,
);

export function scoped(scope: string): Logger {
  return logger.child({ scope });
}
