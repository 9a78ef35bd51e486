import winston from 'winston';
import { config } from './config';

const devFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${message}${extra}`;
  })
);

export const logger = winston.createLogger({
  level: config.logging.level,
  silent: config.server.env === 'test',
  format:
    config.server.env === 'production'
      ? winston.format.combine(winston.format.timestamp(), winston.format.json())
      : devFormat,
  defaultMeta: { service: 'form-pilot' },
  transports: [new winston.transports.Console()],
});
