export * from './request/types';
export * from './request/describe';
export * from './core/events';
export * from './core/OutcomeClassifier';
export * from './core/formatLimits';
export * from './core/RequestLogFormatter';
export * from './core/RequestTracker';
export * from './core/RequestLogger';
export * from './config/ConfigProfile';
export * from './config/options';
export * from './config/config';
