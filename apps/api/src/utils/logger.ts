import path from 'path';
import log4js from 'log4js';
import type { Appender, Logger } from 'log4js';
import { getConfig } from '../config';

let configured = false;

const setup = () => {
  const { logLevel, logDir } = getConfig();
  const appenders: Record<string, Appender> = logDir
    ? {
        console: { type: 'console' },
        file: {
          type: 'dateFile',
          filename: path.join(logDir, 'ehr_app.log'),
          pattern: 'yyyyMMdd',
          keepFileExt: true,
          numBackups: 5
        }
      }
    : { console: { type: 'console' } };

  log4js.configure({
    appenders,
    categories: {
      default: { appenders: Object.keys(appenders), level: logLevel }
    }
  });
  configured = true;
};

export const getLogger = (category: string): Logger => {
  if (!configured) setup();
  const logger = log4js.getLogger(category);
  logger.level = getConfig().logLevel;
  return logger;
};
