export * from './settings';
export * from './latency-baseline';
export * from './outage-tracker';
export * from './anomaly-detector';
export * from './digest-aggregator';
export * from './monitor-context';
