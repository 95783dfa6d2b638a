import pino, { type Logger } from 'pino';
import { readEnv } from './utils/env.js';

export type { Logger };

export const logger: Logger = pino({
  name: 's3-transport',
  level: readEnv('LOG_LEVEL', 'info'),
});
