export * from './gateway-errors';
