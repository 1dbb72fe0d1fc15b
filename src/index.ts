export * from './interfaces';
export * from './classes/remote-executor';
export * from './lib/errors';
export * from './lib/logger';
export * from './lib/sanitization';
export * from './lib/config';
export * from './lib/session';
export * from './lib/timeout';
export * from './actions';
