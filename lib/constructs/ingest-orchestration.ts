import * as cdk from 'aws-cdk-lib/core';
import * as backup from 'aws-cdk-lib/aws-backup';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as events from 'aws-cdk-lib/aws-events';
import * as opensearch from 'aws-cdk-lib/aws-opensearchservice';
import * as s3 from 'aws-cdk-lib/aws-s3';
import { Construct } from 'constructs';
import {
  DEFAULT_CONSOLE_LOG_LEVEL,
  DropboxEnv,
  INGEST_STATUS_TABLE_NAME,
  INGEST_TUNING_DEFAULTS,
  IngestEnv,
  STATUS_TABLE_PARTITION_KEY,
} from '../constants';
import { Environment } from './environment-merge';
import { bindProcessingUnit, ProcessingBinding, ProcessingUnit } from './processing-binding';
import { RelayQueue } from './relay-queue';

export interface IngestOrchestrationProps {
  dropboxBucket: s3.IBucket;
  ingestBucket: s3.IBucket;
  dropboxRelay: RelayQueue;
  ingestRelay: RelayQueue;
  /** Domain the ingest unit writes documents into. */
  searchDomain: opensearch.IDomain;
  /** Validates dropbox arrivals and promotes them into the ingest bucket. */
  dropboxProcessor: ProcessingUnit;
  /** Loads ingest bucket files into OpenSearch. */
  ingestProcessor: ProcessingUnit;
  /** Overrides for the dropbox unit's library defaults */
  dropboxEnvironment?: Environment;
  /** Overrides for the ingest unit's library defaults (CHUNK_SIZE_MB, MAX_PROCESSES, ...) */
  ingestEnvironment?: Environment;
  /** Status table name (default: ingest_status) */
  statusTableName?: string;
  /** Back the status table up into this vault daily */
  backupVault?: backup.IBackupVault;
  /** Removal policy of the status table (default: DESTROY) */
  removalPolicy?: cdk.RemovalPolicy;
}

/**
 * IngestOrchestration wires the two processing units to their relays and
 * owns the status table they report to.
 *
 * Environment precedence for each unit, highest first: variables the function
 * already defines, then the caller's overrides, then the library defaults.
 */
export class IngestOrchestration extends Construct {
  public readonly statusTable: dynamodb.Table;
  public readonly dropboxBinding: ProcessingBinding;
  public readonly ingestBinding: ProcessingBinding;
  public readonly backupPlan?: backup.BackupPlan;

  constructor(scope: Construct, id: string, props: IngestOrchestrationProps) {
    super(scope, id);

    // =========================================================================
    // 1. Status table
    // =========================================================================
    this.statusTable = new dynamodb.Table(this, 'StatusTable', {
      tableName: props.statusTableName ?? INGEST_STATUS_TABLE_NAME,
      partitionKey: { name: STATUS_TABLE_PARTITION_KEY, type: dynamodb.AttributeType.STRING },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      pointInTimeRecoverySpecification: { pointInTimeRecoveryEnabled: true },
      removalPolicy: props.removalPolicy ?? cdk.RemovalPolicy.DESTROY,
    });

    // =========================================================================
    // 2. Dropbox unit
    // =========================================================================
    const dropboxFn = props.dropboxProcessor.fn;
    this.dropboxBinding = bindProcessingUnit(props.dropboxRelay, props.dropboxProcessor, {
      requiredEnvironment: {
        [DropboxEnv.CONSOLE_LOG_LEVEL]: DEFAULT_CONSOLE_LOG_LEVEL,
        [DropboxEnv.DROPBOX_BUCKET_NAME]: props.dropboxBucket.bucketName,
        [DropboxEnv.INGEST_BUCKET_NAME]: props.ingestBucket.bucketName,
        [DropboxEnv.INGEST_STATUS_TABLE]: this.statusTable.tableName,
        [DropboxEnv.RELAY_QUEUE_NAME]: props.dropboxRelay.queue.queueName,
        ...props.dropboxEnvironment,
      },
    });
    // Accepted files are moved out of the dropbox, so the unit also deletes.
    props.dropboxBucket.grantReadWrite(dropboxFn);
    props.dropboxBucket.grantDelete(dropboxFn);
    props.ingestBucket.grantWrite(dropboxFn);
    this.statusTable.grantReadWriteData(dropboxFn);

    // =========================================================================
    // 3. Ingest unit
    // =========================================================================
    const ingestFn = props.ingestProcessor.fn;
    this.ingestBinding = bindProcessingUnit(props.ingestRelay, props.ingestProcessor, {
      requiredEnvironment: {
        ...INGEST_TUNING_DEFAULTS,
        [IngestEnv.OPEN_SEARCH_ENDPOINT]: props.searchDomain.domainEndpoint,
        [IngestEnv.BUCKET_NAME]: props.ingestBucket.bucketName,
        [IngestEnv.INGEST_STATUS_TABLE]: this.statusTable.tableName,
        [IngestEnv.RELAY_QUEUE_NAME]: props.ingestRelay.queue.queueName,
        ...props.ingestEnvironment,
      },
    });
    props.ingestBucket.grantRead(ingestFn);
    props.searchDomain.grantReadWrite(ingestFn);
    this.statusTable.grantReadWriteData(ingestFn);

    // =========================================================================
    // 4. Status table backup (optional)
    // =========================================================================
    if (props.backupVault) {
      this.backupPlan = new backup.BackupPlan(this, 'StatusTableBackupPlan', {
        backupVault: props.backupVault,
      });
      this.backupPlan.addRule(new backup.BackupPlanRule({
        ruleName: 'daily-status-table',
        completionWindow: cdk.Duration.hours(2),
        startWindow: cdk.Duration.hours(1),
        scheduleExpression: events.Schedule.cron({ day: '*', hour: '2', minute: '0' }),
        moveToColdStorageAfter: cdk.Duration.days(7),
        deleteAfter: cdk.Duration.days(120),
      }));
      this.backupPlan.addSelection('StatusTableSelection', {
        resources: [backup.BackupResource.fromDynamoDbTable(this.statusTable)],
      });
    }
  }
}
