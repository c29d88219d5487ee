import winston from 'winston';

const { combine, timestamp, errors, json } = winston.format;

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'warn',
  format: combine(timestamp(), errors({ stack: true }), json()),
  defaultMeta: { service: 'eduguide' },
  transports: [
    // stdout belongs to the chat, so every level goes to stderr
    new winston.transports.Console({
      stderrLevels: Object.keys(winston.config.npm.levels),
    }),
  ],
});

export function configureLogger(level: string, logFile?: string): void {
  logger.level = level;
  if (logFile) {
    logger.add(new winston.transports.File({ filename: logFile }));
  }
}
