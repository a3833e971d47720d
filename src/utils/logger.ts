import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { ConfigLoader } from './configLoader';

const configLoader = ConfigLoader.getInstance();
const serverConfig = configLoader.getServerConfig();
const loggingConfig = configLoader.getLoggingConfig();

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ level, message, timestamp }) => {
        return `${timestamp} ${level}: ${message}`;
      })
    ),
  }),
];

// Test runs keep the console transport only.
if (loggingConfig.toFile && process.env.NODE_ENV !== 'test') {
  const logsDir = loggingConfig.directory;
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }
  transports.push(
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error'
    }),
    new winston.transports.File({
      filename: path.join(logsDir, 'combined.log')
    })
  );
}

const logger = winston.createLogger({
  level: serverConfig.logLevel || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  defaultMeta: { service: 'playlist-mirror' },
  transports,
});

export default logger;
