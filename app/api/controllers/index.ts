export * from './base.controller';
export * from './v1';
export * from './internal';
export * from './admin';
