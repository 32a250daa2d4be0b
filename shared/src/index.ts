export * from './config';
export * from './logger';
export * from './errors';
export * from './types';
export * from './signature';
export * from './timestamps';
export * from './mongo';
export * from './models';
export * from './store';
