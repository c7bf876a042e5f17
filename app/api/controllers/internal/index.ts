export * from './streaming-relay.controller';
