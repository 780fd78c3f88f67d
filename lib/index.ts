export * from './constants';
export * from './errors';
export * from './config';
export * from './validation';

export * from './constructs/relay-queue';
export * from './constructs/arrival-notifier';
export * from './constructs/environment-merge';
export * from './constructs/processing-binding';
export * from './constructs/lambda-factory';
export * from './constructs/backend-storage';
export * from './constructs/ingest-orchestration';
export * from './constructs/search-domain';
export * from './constructs/index-archival';
export * from './constructs/certificate';
export * from './constructs/networking';
export * from './constructs/backup-vault';
export * from './constructs/frontend-site';

export * from './storage-stack';
export * from './registry-stack';
export * from './certificate-stack';
export * from './network-stack';
export * from './search-stack';
export * from './ingest-stack';
export * from './frontend-stack';

export * from './runtime/logger';
export * from './runtime/status-record';
export * from './runtime/status-ledger';
