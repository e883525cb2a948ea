export * from './types';
export * from './errors';
export * from './constants';
export * from './utils';
export * from './logging';
export * from './metadata';
export * from './dialect';
export * from './criteria';
