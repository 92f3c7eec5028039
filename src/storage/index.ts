export * from './store';
export * from './memory-store';
