import { ConsoleLogger } from './consoleLogger';
export type { Logger, LogLevel } from './types';

export const logger = new ConsoleLogger();
export { ConsoleLogger };
