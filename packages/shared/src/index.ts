export const name = '@pacup/shared';

export * from './errors';
export * from './logger';
export * from './config/schema';
export * from './fs/io';
export * from './string-utils';
