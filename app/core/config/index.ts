export * from './gateway-config.schema';
export * from './configuration.service';
