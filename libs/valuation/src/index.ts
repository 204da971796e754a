export * from './types';
export * from './decimal';
export * from './aggregate-portfolio';
