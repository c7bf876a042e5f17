export * from './request-tracker.plugin';
export * from './error.plugin';
export * from './metrics.plugin';
