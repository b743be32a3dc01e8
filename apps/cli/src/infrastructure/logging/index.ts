export { LoggerFactory, createSilentLogger } from './LoggerFactory';
export type { LogComponent, LoggerFactoryConfig } from './LoggerFactory';
