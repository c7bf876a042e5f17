export * from './adaptor-registry';
