export * from './alias';
export * from './validation';
