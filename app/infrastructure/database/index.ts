export * from './database.service';
export * from './schemas';
