import winston from 'winston';

const LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

function resolveLevel(): string {
  const level = process.env.DOCMODEL_LOG_LEVEL?.toLowerCase();
  return level && LEVELS.includes(level) ? level : 'warn';
}

const baseLogger = winston.createLogger({
  level: resolveLevel(),
  format: winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, context, ...meta }) => {
      const scope = typeof context === 'string' ? ` [${context}]` : '';
      const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `[${String(timestamp)}] ${level}${scope} ${String(message)}${extra}`;
    }),
  ),
  // Everything goes to stderr so JSON output on stdout stays clean
  transports: [new winston.transports.Console({ stderrLevels: LEVELS })],
});

export type Logger = winston.Logger;

export function createContextLogger(context: string): Logger {
  return baseLogger.child({ context });
}

export function setLogLevel(level: string): void {
  if (LEVELS.includes(level)) {
    baseLogger.level = level;
  }
}
