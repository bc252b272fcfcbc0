export * from './domain';
export * from './types';
export * from './config/presets';
