import winston from 'winston';

import type { Config } from '../config/args';

// Define custom log levels with notice between info and warn (like syslog)
const customLevels = {
  levels: {
    error: 0,
    warn: 1,
    notice: 2,
    info: 3,
    debug: 4,
  },
  colors: {
    error: 'red',
    warn: 'yellow',
    notice: 'cyan',
    info: 'green',
    debug: 'blue',
  },
};

winston.addColors(customLevels.colors);

// Add notice method to winston.Logger type
declare module 'winston' {
  interface Logger {
    notice: winston.LeveledLogMethod;
  }
}

export const buildLogger = (
  config: Pick<Config, 'log_level' | 'logger' | 'log_file'>
): winston.Logger => {
  return winston.createLogger({
    levels: customLevels.levels,
    level: config.log_level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message }) => {
        return `${String(timestamp)} [${level}]: ${String(message)}`;
      })
    ),
    transports: [
      config.logger === 'console'
        ? new winston.transports.Console({
            // stdout is kept for the command line's output
            stderrLevels: Object.keys(customLevels.levels),
            format: winston.format.json(),
          })
        : new winston.transports.File({ filename: config.log_file }),
    ],
  });
};
