export * from './inference.types';
export * from './adaptor.types';
