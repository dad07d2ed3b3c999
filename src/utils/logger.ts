import winston from 'winston';
import path from 'path';
import { config } from './config';

const SERVICE_NAME = 'depweave';

const logFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({
    format: 'HH:mm:ss',
  }),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    // Only counts and short identifiers are worth printing on a terminal
    const essentialMeta: Record<string, unknown> = {};
    for (const key of Object.keys(meta)) {
      if (key !== 'service' && key !== 'component') {
        essentialMeta[key] = meta[key];
      }
    }

    let output = `${timestamp} [${level}]: ${message}`;

    if (component && component !== SERVICE_NAME) {
      output += ` (${component})`;
    }

    if (Object.keys(essentialMeta).length > 0) {
      const serialized = JSON.stringify(essentialMeta);
      if (serialized.length < 200) {
        output += ` ${serialized}`;
      }
    }

    return output;
  })
);

export const logger = winston.createLogger({
  level: config.logging.level,
  format: logFormat,
  defaultMeta: { service: SERVICE_NAME },
  transports: [
    // stdout belongs to command output, so every level goes to stderr
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      silent: config.nodeEnv === 'test',
    }),
  ],
});

if (config.logging.file) {
  logger.add(
    new winston.transports.File({
      filename: config.logging.file,
      maxsize: 5 * 1024 * 1024, // 5MB
      maxFiles: 5,
    })
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(path.dirname(config.logging.file), 'error.log'),
      level: 'error',
      maxsize: 5 * 1024 * 1024,
      maxFiles: 5,
    })
  );
}

// Create child loggers for different components
export const createComponentLogger = (component: string): winston.Logger => {
  return logger.child({ component });
};

export const flushLogs = async (): Promise<void> => {
  return new Promise(resolve => {
    setImmediate(() => {
      setImmediate(() => {
        setTimeout(resolve, 50);
      });
    });
  });
};
