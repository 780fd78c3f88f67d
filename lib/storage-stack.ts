import * as cdk from 'aws-cdk-lib/core';
import * as backup from 'aws-cdk-lib/aws-backup';
import { Construct } from 'constructs';
import { BackendStorage } from './constructs/backend-storage';
import { BackupVaultConstruct } from './constructs/backup-vault';

export interface StorageStackProps extends cdk.StackProps {
  /** Prefix of bucket names; the account ID is appended for global uniqueness (default: data-center) */
  resourcePrefix?: string;
  /** Enable object versioning on the backend buckets */
  enableBucketVersioning?: boolean;
  /** Create a backup vault for the status table (default: true) */
  enableBackups?: boolean;
  /** Only dropbox keys under this prefix are relayed */
  dropboxKeyPrefix?: string;
  /** Deliveries per relay message before dead-lettering (default: 1) */
  maxReceiveCount?: number;
}

/**
 * StorageStack is the **stateful** stack: buckets, relay queues and the
 * backup vault. Processing stacks can be destroyed and redeployed without
 * orphaning data.
 *
 * Resources:
 * 1. Dropbox, ingest and snapshot buckets
 * 2. Dropbox and ingest relay queues with dead-letter queues
 * 3. Dropbox upload role
 * 4. Backup vault (optional)
 *
 * Termination protection is enabled to prevent accidental deletion.
 */
export class StorageStack extends cdk.Stack {
  public readonly backend: BackendStorage;
  public readonly backupVault?: backup.BackupVault;

  constructor(scope: Construct, id: string, props?: StorageStackProps) {
    super(scope, id, {
      ...props,
      terminationProtection: true,
    });

    const prefix = props?.resourcePrefix ?? 'data-center';

    // =========================================================================
    // 1. Buckets, relays and upload role
    // =========================================================================
    this.backend = new BackendStorage(this, 'Backend', {
      dropboxBucketName: `${prefix}-dropbox-${this.account}`,
      ingestBucketName: `${prefix}-ingest-${this.account}`,
      snapshotBucketName: `${prefix}-snapshots-${this.account}`,
      enableBucketVersioning: props?.enableBucketVersioning,
      dropboxKeyPrefix: props?.dropboxKeyPrefix,
      maxReceiveCount: props?.maxReceiveCount,
    });

    // =========================================================================
    // 2. Backup vault (optional)
    // =========================================================================
    if (props?.enableBackups ?? true) {
      this.backupVault = new BackupVaultConstruct(this, 'Backup', {
        vaultName: `${prefix}-backup-vault`,
      }).vault;
    }

    // =========================================================================
    // Outputs
    // =========================================================================
    new cdk.CfnOutput(this, 'DropboxBucketName', {
      value: this.backend.dropboxBucket.bucketName,
      description: 'Bucket external producers upload into',
    });

    new cdk.CfnOutput(this, 'IngestBucketName', {
      value: this.backend.ingestBucket.bucketName,
      description: 'Bucket of files accepted for ingest',
    });

    new cdk.CfnOutput(this, 'DropboxDeadLetterQueueUrl', {
      value: this.backend.dropboxRelay.deadLetterQueue.queueUrl,
      description: 'Dropbox arrivals that exhausted their retries',
    });

    new cdk.CfnOutput(this, 'IngestDeadLetterQueueUrl', {
      value: this.backend.ingestRelay.deadLetterQueue.queueUrl,
      description: 'Ingest arrivals that exhausted their retries',
    });

    new cdk.CfnOutput(this, 'DropboxUploadRoleArn', {
      value: this.backend.uploadRole.roleArn,
      description: 'Role producers assume to upload into the dropbox bucket',
    });
  }
}
