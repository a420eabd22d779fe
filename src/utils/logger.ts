import winston from 'winston';

const isTest = process.env.NODE_ENV === 'test';

// Levels follow npm's order so morgan can stream into `http`
const level = process.env.LOG_LEVEL ?? (isTest ? 'warn' : 'info');

const consoleFormat = winston.format.printf(({ timestamp, level: lvl, message, stack, ...meta }) => {
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  const trace = typeof stack === 'string' ? `\n${stack}` : '';
  return `${String(timestamp)} ${lvl}: ${String(message)}${rest}${trace}`;
});

export const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.timestamp(),
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), consoleFormat),
      stderrLevels: ['error', 'warn'],
    }),
  ],
});

/**
 * Send every level to stderr, leaving stdout to a script's own output.
 */
export function routeLogsToStderr(): void {
  logger.clear().add(
    new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), consoleFormat),
      stderrLevels: Object.keys(winston.config.npm.levels),
    }),
  );
}
