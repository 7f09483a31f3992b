export * from './user';
export * from './campaign';
export * from './Contract';
export * from './Payment';
