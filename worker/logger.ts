import winston from 'winston';

let logger: winston.Logger | null = null;

export type Logger = winston.Logger;

export function getLogger(options: { level?: string; production?: boolean } = {}) {
  if (logger) return logger;

  const level = options.level || 'info';
  const isProd = options.production ?? false;

  const baseFormat = isProd
    ? winston.format.json()
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp(),
        winston.format.printf(({ level, message, timestamp, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
        })
      );

  logger = winston.createLogger({
    level,
    defaultMeta: { service: 'replan-engine' },
    transports: [new winston.transports.Console({ format: baseFormat })],
  });

  return logger;
}

/** Logger that drops everything; used where no sink is wired, e.g. tests. */
export const createSilentLogger = (): Logger =>
  winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console()],
  });
