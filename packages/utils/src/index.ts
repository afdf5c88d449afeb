export * from './logger';
export * from './formatters';
