export * from './authentication.service';
export * from './authorization.service';
