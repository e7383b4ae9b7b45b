/**
 * Structured logger shared by every component
 */
import pino from 'pino';
import Config from '../config';

export const logger = pino({
  name: Config.service.name,
  level: Config.logging.level,
  base: {
    version: Config.service.version,
    env: process.env.NODE_ENV || 'development',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Call sites log failures under `error`, which pino leaves unserialized by default
  serializers: {
    error: pino.stdSerializers.err,
  },
  formatters: {
    level: label => ({ level: label }),
  },
  transport: Config.logging.prettyPrint
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' } }
    : undefined,
});

export default logger;
