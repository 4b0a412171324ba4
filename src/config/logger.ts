import winston from 'winston';
import { config } from './environment';
import path from 'path';
import fs from 'fs';

const isTest = config.server.env === 'test';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...metadata }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
  })
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleFormat,
    silent: isTest
  })
];

// Tests run without touching the filesystem
if (!isTest) {
  if (!fs.existsSync(config.logging.filePath)) {
    fs.mkdirSync(config.logging.filePath, { recursive: true });
  }

  transports.push(
    new winston.transports.File({
      filename: path.join(config.logging.filePath, 'error.log'),
      level: 'error',
      maxsize: 10485760, // 10MB
      maxFiles: 100,
      tailable: true
    }),
    new winston.transports.File({
      filename: path.join(config.logging.filePath, 'combined.log'),
      maxsize: 10485760,
      maxFiles: 100,
      tailable: true
    })
  );
}

export const logger = winston.createLogger({
  level: config.logging.level,
  format: logFormat,
  transports
});

logger.info('Logger initialized', {
  level: config.logging.level,
  environment: config.server.env
});
