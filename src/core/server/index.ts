export * from './response';
