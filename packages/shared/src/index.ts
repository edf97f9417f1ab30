export * from './types';
export * from './dates';
export * from './env';
export * from './logger';
export * from './schemas';
