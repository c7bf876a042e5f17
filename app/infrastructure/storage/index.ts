export * from './jsonl-batch-file.store';
