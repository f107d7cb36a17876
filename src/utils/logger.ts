import winston from 'winston';

// Read directly from the environment: the logger must work before (and when)
// the full configuration fails to validate.
const nodeEnv = process.env.NODE_ENV || 'development';
const logLevel = process.env.LOG_LEVEL || 'info';

// Structured JSON lines for container and serverless log collectors
const structuredFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    return JSON.stringify({
      timestamp,
      severity: level.toUpperCase(),
      message,
      ...meta
    });
  })
);

// Create logger instance
const logger = winston.createLogger({
  level: logLevel,
  silent: nodeEnv === 'test',
  format: nodeEnv === 'production'
    ? structuredFormat
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      ),
  transports: [
    new winston.transports.Console()
  ]
});

// Add file transport in development
if (nodeEnv === 'development') {
  logger.add(new winston.transports.File({
    filename: 'logs/error.log',
    level: 'error'
  }));
  logger.add(new winston.transports.File({
    filename: 'logs/combined.log'
  }));
}

export default logger;
