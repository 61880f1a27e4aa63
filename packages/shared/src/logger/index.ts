import { ConsoleLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
export type { Logger, LogLevel, MaybePromise } from './types';
export type { ConsoleLoggerOptions } from './consoleLogger';

export const silentLogger = new ConsoleLogger({ level: 'silent' });
export { ConsoleLogger, JsonlLogger };
