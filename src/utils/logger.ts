import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

const isTest = process.env.NODE_ENV === 'test';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

function rotatingFile(name: string, maxFiles: string, level?: string): DailyRotateFile {
  return new DailyRotateFile({
    filename: `logs/${name}-%DATE%.log`,
    datePattern: 'YYYY-MM-DD',
    maxSize: '20m',
    maxFiles,
    level,
    format: logFormat
  });
}

// Tests log to a silent console only
const transports: winston.transport[] = isTest
  ? [new winston.transports.Console({ silent: true })]
  : [
      rotatingFile('error', '30d', 'error'),
      rotatingFile('combined', '14d', 'info'),
      new winston.transports.Console({ format: consoleFormat })
    ];

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  defaultMeta: { service: 'traffic-controller' },
  transports,
  exceptionHandlers: isTest ? undefined : [rotatingFile('exceptions', '30d')],
  rejectionHandlers: isTest ? undefined : [rotatingFile('rejections', '30d')]
});
