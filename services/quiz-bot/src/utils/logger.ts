import winston from 'winston';
import { logLevel, nodeEnv } from '../config/environment';

export const logger = winston.createLogger({
  level: logLevel,
  silent: nodeEnv === 'test',
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: {
    service: 'quiz-bot',
    version: process.env.npm_package_version || '1.0.0'
  },
  transports: []
});

if (nodeEnv === 'production') {
  logger.add(new winston.transports.File({
    filename: 'logs/error.log',
    level: 'error',
    maxsize: 5242880, // 5MB
    maxFiles: 5
  }));
  logger.add(new winston.transports.File({
    filename: 'logs/combined.log',
    maxsize: 5242880,
    maxFiles: 5
  }));

  logger.exceptions.handle(
    new winston.transports.File({ filename: 'logs/exceptions.log' })
  );
  logger.rejections.handle(
    new winston.transports.File({ filename: 'logs/rejections.log' })
  );
}

// Container logs are read from stdout, so the console transport is always on
logger.add(new winston.transports.Console({
  format: nodeEnv === 'production'
    ? winston.format.json()
    : winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
        let msg = `${timestamp} [${service}] ${level}: ${message}`;

        const metaKeys = Object.keys(meta).filter(key => key !== 'version');
        if (metaKeys.length > 0) {
          const extra: Record<string, unknown> = {};
          for (const key of metaKeys) {
            extra[key] = meta[key];
          }
          msg += ` ${JSON.stringify(extra)}`;
        }

        return msg;
      })
    )
}));

export default logger;
