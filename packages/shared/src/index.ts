export * from './types/probe';
export * from './types/events';
export * from './types/digest';
