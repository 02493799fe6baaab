export * from './config/constants';
export * from './models/merged-image';
export * from './models/platform';
export * from './models/version-key';
export * from './services/grouping-service';
export * from './services/hub-service';
export * from './services/ordering-service';
export * from './services/summary-service';
export * from './types/hub';
export * from './utils/compare-utils';
export * from './utils/errors';
export * from './utils/hub-parser';
export * from './utils/logger';
export * from './utils/repository-utils';
