import { Logger } from 'tslog';
import { appConfig, type LogLevelName } from '@/config/app.config';

const LEVEL_IDS: Record<LogLevelName, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export const logger = new Logger({
  name: 'nutrition-backend',
  minLevel: LEVEL_IDS[appConfig.logLevel],
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
  type: 'pretty',
});
