export * from './types';
export * from './error-stack';
export * from './backend-error';
export * from './errors';
export * from './warehouse-errors';
