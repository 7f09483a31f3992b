export * from './common';
export * from './lifecycle';
export * from './recommendation';
