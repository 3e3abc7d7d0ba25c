export * from './logger';
export * from './rounding';
export * from './file-utils';
export * from './name-utils';
