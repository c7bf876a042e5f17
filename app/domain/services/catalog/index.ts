export * from './federation-config.schema';
export * from './endpoint-catalog.service';
