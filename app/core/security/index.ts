export * from './crypto.service';
