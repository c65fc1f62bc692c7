export * from './confirmation';
export * from './context';
export * from './errors';
export * from './orchestrator';
export * from './poller';
export * from './stage';
export * from './summary';
export * from './types';
