export * from './entity';
export * from './errors';
export * from './auth';
export * from './Context';
export * from './common/users';
export * from './common/contract';
export * from './common/analytics';
export * from './common/campaign';
export * from './notifications';
export { logger, type Logger } from './logger';
