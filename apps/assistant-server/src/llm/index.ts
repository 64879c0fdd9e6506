export * from './types';
export * from './errors';
export * from './audit';
export * from './keyResolution';
export * from './router';
export * from './providers/base';
export * from './providers/openai';
export * from './providers/claude';
