export * from './interfaces';
export * from './memory';
