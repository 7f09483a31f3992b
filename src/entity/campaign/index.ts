export * from './Campaign';
