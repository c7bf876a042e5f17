export * from './fabric.client';
