export * from './http-identity.provider';
