export * from './types';
export * from './interfaces';
export * from './errors';
export * from './utils';
export * from './logger';
export * from './config';
export * from './grammar';
export * from './query';
export * from './transaction';
export * from './connection';
