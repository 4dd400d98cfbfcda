export * from './fetch-errors';
