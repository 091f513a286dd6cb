export * from './types';
export * from './keys';
export * from './registry';
export * from './github';
export * from './file';
