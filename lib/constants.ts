/** Status table defaults shared by the ingest orchestration and the runtime ledger. */
export const INGEST_STATUS_TABLE_NAME = 'ingest_status';
export const STATUS_TABLE_PARTITION_KEY = 'item_id';

export const OPENSEARCH_SNAPSHOT_REPO_NAME = 'opensearch-snapshot-repo';

export const DROPBOX_UPLOAD_ROLE_NAME = 'dropbox-upload-role';
export const DROPBOX_UPLOAD_POLICY_NAME = 'dropbox-upload-policy';

/** Environment keys injected into the dropbox processing unit. */
export const DropboxEnv = {
  DROPBOX_BUCKET_NAME: 'DROPBOX_BUCKET_NAME',
  INGEST_BUCKET_NAME: 'INGEST_BUCKET_NAME',
  INGEST_STATUS_TABLE: 'INGEST_STATUS_TABLE',
  RELAY_QUEUE_NAME: 'RELAY_QUEUE_NAME',
  CONSOLE_LOG_LEVEL: 'CONSOLE_LOG_LEVEL',
} as const;

/** Environment keys injected into the ingest processing unit. */
export const IngestEnv = {
  OPEN_SEARCH_ENDPOINT: 'OPEN_SEARCH_ENDPOINT',
  BUCKET_NAME: 'BUCKET_NAME',
  INGEST_STATUS_TABLE: 'INGEST_STATUS_TABLE',
  RELAY_QUEUE_NAME: 'RELAY_QUEUE_NAME',
  CONSOLE_LOG_LEVEL: 'CONSOLE_LOG_LEVEL',
  CHUNK_SIZE_MB: 'CHUNK_SIZE_MB',
  GENERATE_IDS: 'GENERATE_IDS',
  MAX_PROCESSES: 'MAX_PROCESSES',
  MAX_FILE_SIZE_MB: 'MAX_FILE_SIZE_MB',
  OPENSEARCH_CLIENT_REQUEST_TIMEOUT: 'OPENSEARCH_CLIENT_REQUEST_TIMEOUT',
} as const;

/** Environment keys injected into the snapshot function. */
export const SnapshotEnv = {
  OPEN_SEARCH_ENDPOINT: 'OPEN_SEARCH_ENDPOINT',
  SNAPSHOT_S3_BUCKET: 'SNAPSHOT_S3_BUCKET',
  SNAPSHOT_ROLE_ARN: 'SNAPSHOT_ROLE_ARN',
  SNAPSHOT_REPO_NAME: 'SNAPSHOT_REPO_NAME',
  CONSOLE_LOG_LEVEL: 'CONSOLE_LOG_LEVEL',
} as const;

/** Environment keys injected into the index sunset function. */
export const ArchivalEnv = {
  OPEN_SEARCH_ENDPOINT: 'OPEN_SEARCH_ENDPOINT',
  INDEX_SIZE_THRESHOLD_GB: 'INDEX_SIZE_THRESHOLD_GB',
  SNS_TOPIC_ARN: 'SNS_TOPIC_ARN',
  CONSOLE_LOG_LEVEL: 'CONSOLE_LOG_LEVEL',
} as const;

export const DEFAULT_CONSOLE_LOG_LEVEL = 'INFO';

/** Tuning defaults for the ingest unit; callers override any of them per deployment. */
export const INGEST_TUNING_DEFAULTS: Readonly<Record<string, string>> = {
  [IngestEnv.CONSOLE_LOG_LEVEL]: DEFAULT_CONSOLE_LOG_LEVEL,
  [IngestEnv.CHUNK_SIZE_MB]: '5',
  [IngestEnv.GENERATE_IDS]: '1',
  [IngestEnv.MAX_PROCESSES]: '25',
  [IngestEnv.MAX_FILE_SIZE_MB]: '100',
  [IngestEnv.OPENSEARCH_CLIENT_REQUEST_TIMEOUT]: '60',
};
