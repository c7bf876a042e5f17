export * from './request-log.service';
