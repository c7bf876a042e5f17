export * from './background-worker.service';
