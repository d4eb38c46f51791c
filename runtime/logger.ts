import pino from 'pino';
import { loadConfig } from './config';

export const logger = pino({
  name: 'proxy-runtime',
  level: loadConfig().logLevel,
});
