export * from './relay-channel';
export * from './stream-relay.service';
export * from './stream-accumulator';
export * from './stream-proxy.service';
