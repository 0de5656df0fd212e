import winston from 'winston';

const logLevel = process.env.LOG_LEVEL || 'info';
const serviceName = process.env.SERVICE_NAME || 'chat-relay';

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf((info) => {
    const { timestamp, level, message, service, component, stack, ...meta } = info;

    // Collapse message to single line
    const cleanMessage = String(message).replace(/\n/g, ' ').replace(/\s+/g, ' ').trim();
    const hasUsefulMeta =
      Object.keys(meta).length > 0 && !Object.values(meta).every((v) => v === undefined || v === null);
    const metaStr = hasUsefulMeta ? ` ${JSON.stringify(meta)}` : '';
    const source = String(component || service || 'relay');
    const stackStr = typeof stack === 'string' ? `\n${stack}` : '';

    return `${String(timestamp)} ${level} ${source}: ${cleanMessage}${metaStr}${stackStr}`;
  })
);

const transports: winston.transport[] = [
  // All levels go to stderr
  new winston.transports.Console({
    format: consoleFormat,
    stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
  }),
];

if (process.env.NODE_ENV === 'production') {
  transports.push(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: winston.format.json(),
    }),
    new winston.transports.File({
      filename: 'logs/combined.log',
      format: winston.format.json(),
    })
  );
}

export const logger = winston.createLogger({
  level: logLevel,
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: serviceName },
  transports,
});

/**
 * Logger tagged with the component name, e.g. `createLogger('completion')`
 */
export function createLogger(component: string): winston.Logger {
  return logger.child({ component });
}

export function setLogLevel(level: string): void {
  logger.level = level;
}

export default logger;
