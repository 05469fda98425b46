import { join } from 'node:path';
import { createLogger, format, transports } from 'winston';
import { loadLoggingConfig } from '../config';

const { debug: isDebug, logDir } = loadLoggingConfig();

const fileTransports = logDir
  ? [
      new transports.File({ filename: join(logDir, 'error.log'), level: 'error' }),
      new transports.File({ filename: join(logDir, 'combined.log') }),
    ]
  : [];

export const logger = createLogger({
  level: isDebug ? 'debug' : 'info',
  format: format.combine(
    format.timestamp(),
    format.json(),
    format.printf(({ timestamp, level, message, ...rest }) => {
      const context = rest.context ? `[${String(rest.context)}] ` : '';
      return `${String(timestamp)} ${level}: ${context}${String(message)} ${JSON.stringify(rest)}`;
    })
  ),
  transports: [
    ...fileTransports,
    // stdout belongs to the MCP stdio transport
    new transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      format: format.combine(format.colorize(), format.simple()),
    }),
  ],
});

export function debug(context: string, message: string, data?: Record<string, unknown>) {
  if (isDebug) {
    logger.debug(message, { context, ...data });
  }
}
