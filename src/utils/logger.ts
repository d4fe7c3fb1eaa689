import winston from 'winston';
import chalk from 'chalk';
import * as fs from 'node:fs';
import * as path from 'node:path';

export type Component = 'parser' | 'style' | 'detector' | 'profile' | 'recommend' | 'engine' | 'cli';

const COMPONENT_COLORS: Record<Component, (text: string) => string> = {
  parser: chalk.cyan,
  style: chalk.magenta,
  detector: chalk.yellow,
  profile: chalk.blue,
  recommend: chalk.green,
  engine: chalk.white,
  cli: chalk.gray,
};

function isComponent(value: unknown): value is Component {
  return typeof value === 'string' && value in COMPONENT_COLORS;
}

const customFormat = winston.format.printf(({ level, message, timestamp, component }) => {
  const ts = chalk.gray(`[${String(timestamp)}]`);
  const tag = isComponent(component) ? COMPONENT_COLORS[component](`[${component}]`) : '';
  return `${ts} ${level} ${tag} ${String(message)}`;
});

const logger = winston.createLogger({
  level: process.env.STYLEWISE_LOG_LEVEL ?? 'info',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    customFormat,
  ),
  transports: [
    new winston.transports.Console({ stderrLevels: ['error', 'warn', 'info', 'debug'] }),
  ],
});

export function addFileTransport(baseDir: string): void {
  const logDir = path.join(baseDir, '.stylewise', 'logs');
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'stylewise-error.log'),
      level: 'error',
      maxsize: 5 * 1024 * 1024,
      maxFiles: 3,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json(),
      ),
    }),
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'stylewise-combined.log'),
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json(),
      ),
    }),
  );
}

export function setLogLevel(level: string): void {
  logger.level = level;
}

export function componentLog(
  component: Component,
  message: string,
  level: string = 'info',
): void {
  logger.log({ level, message, component });
}

export default logger;
