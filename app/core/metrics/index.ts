export * from './types';
export * from './collectors';
export * from './metrics.service';
