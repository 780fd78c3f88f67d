import * as cdk from 'aws-cdk-lib/core';
import * as backup from 'aws-cdk-lib/aws-backup';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as ecr from 'aws-cdk-lib/aws-ecr';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as opensearch from 'aws-cdk-lib/aws-opensearchservice';
import { Construct } from 'constructs';
import { BackendStorage } from './constructs/backend-storage';
import { Environment } from './constructs/environment-merge';
import { IngestOrchestration } from './constructs/ingest-orchestration';
import { createContainerProcessingUnit } from './constructs/lambda-factory';

export interface IngestStackProps extends cdk.StackProps {
  /** Buckets and relays from StorageStack */
  storage: BackendStorage;
  searchDomain: opensearch.IDomain;
  dropboxRepo: ecr.IRepository;
  ingestRepo: ecr.IRepository;
  /** Vault for daily status table backups */
  backupVault?: backup.IBackupVault;
  /** Overrides for the ingest unit's tuning defaults */
  ingestEnvironment?: Environment;
}

/**
 * IngestStack (stateless): the two processing functions, their queue
 * subscriptions and the status table they report to.
 *
 * Function timeouts stay below the relays' 20 minute visibility timeout.
 */
export class IngestStack extends cdk.Stack {
  public readonly dropboxProcessor: lambda.Function;
  public readonly ingestProcessor: lambda.Function;
  public readonly statusTable: dynamodb.Table;

  constructor(scope: Construct, id: string, props: IngestStackProps) {
    super(scope, id, props);

    // =========================================================================
    // Processing functions
    // =========================================================================
    const dropboxUnit = createContainerProcessingUnit(this, 'DropboxProcessor', {
      description: 'Validates dropbox arrivals and promotes accepted files to the ingest bucket',
      repository: props.dropboxRepo,
      imageTag: 'dropbox-latest',
      timeout: cdk.Duration.minutes(5),
      memorySize: 1024,
    });

    const ingestUnit = createContainerProcessingUnit(this, 'IngestProcessor', {
      description: 'Loads ingest bucket files into OpenSearch in chunks',
      repository: props.ingestRepo,
      imageTag: 'ingest-latest',
      timeout: cdk.Duration.minutes(15),
      memorySize: 3008,
      ephemeralStorageSize: cdk.Size.mebibytes(2048),
    });

    // =========================================================================
    // Orchestration
    // =========================================================================
    const orchestration = new IngestOrchestration(this, 'Orchestration', {
      dropboxBucket: props.storage.dropboxBucket,
      ingestBucket: props.storage.ingestBucket,
      dropboxRelay: props.storage.dropboxRelay,
      ingestRelay: props.storage.ingestRelay,
      searchDomain: props.searchDomain,
      dropboxProcessor: dropboxUnit,
      ingestProcessor: ingestUnit,
      ingestEnvironment: props.ingestEnvironment,
      backupVault: props.backupVault,
    });

    this.dropboxProcessor = dropboxUnit.fn;
    this.ingestProcessor = ingestUnit.fn;
    this.statusTable = orchestration.statusTable;

    new cdk.CfnOutput(this, 'StatusTableName', {
      value: this.statusTable.tableName,
      description: 'DynamoDB ingest status table name',
    });
  }
}
