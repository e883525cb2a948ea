export { createConsoleLogger, truncateSql } from './console-logger';
