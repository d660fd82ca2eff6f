export * from './events';
export * from './database';
export * from './config';
export * from './jokes';
