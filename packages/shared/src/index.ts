export const name = '@roster/shared';

export * from './types/events';
export * from './logger';
export * from './errors';
export * from './fs/io';
export * from './fs/path';
export * from './config/schema';
