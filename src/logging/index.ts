export * from './logger';
export { ConsoleLogger } from './console-logger';
