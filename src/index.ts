export * from './types';
export * from './core';
export * from './device';
export { loadConfig, getDefaultConfig, validateConfig } from './config';
