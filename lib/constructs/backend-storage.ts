import * as cdk from 'aws-cdk-lib/core';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as s3 from 'aws-cdk-lib/aws-s3';
import { Construct } from 'constructs';
import { DROPBOX_UPLOAD_POLICY_NAME, DROPBOX_UPLOAD_ROLE_NAME } from '../constants';
import { addArrivalNotification } from './arrival-notifier';
import { createRelayQueue, RelayQueue } from './relay-queue';

export interface BackendStorageProps {
  /** Bucket that external producers upload raw files into. */
  dropboxBucketName: string;
  /** Bucket the dropbox unit promotes accepted files into. */
  ingestBucketName: string;
  /** Bucket holding OpenSearch snapshots (objects expire after 90 days). */
  snapshotBucketName: string;
  /** Enable object versioning on all three buckets (default: false) */
  enableBucketVersioning?: boolean;
  /** Only dropbox keys under this prefix are relayed (default: every key) */
  dropboxKeyPrefix?: string;
  /** Dropbox relay queue name (default: DropboxQueue) */
  dropboxQueueName?: string;
  /** Ingest relay queue name (default: IngestQueue) */
  ingestQueueName?: string;
  /** Deliveries per message before dead-lettering, both relays (default: 1) */
  maxReceiveCount?: number;
  /** Relay visibility timeout; must exceed the processing functions' timeouts (default: 20 minutes) */
  visibilityTimeout?: cdk.Duration;
  /** Removal policy of the buckets (default: DESTROY) */
  removalPolicy?: cdk.RemovalPolicy;
}

/**
 * Buckets and relay queues of the ingest pipeline.
 *
 * dropbox bucket --(ObjectCreated)--> dropbox relay --> dropbox unit
 * ingest bucket  --(ObjectCreated)--> ingest relay  --> ingest unit
 *
 * Also creates the role external uploaders assume to write into the dropbox.
 */
export class BackendStorage extends Construct {
  public readonly dropboxBucket: s3.Bucket;
  public readonly ingestBucket: s3.Bucket;
  public readonly snapshotBucket: s3.Bucket;
  public readonly dropboxRelay: RelayQueue;
  public readonly ingestRelay: RelayQueue;
  public readonly uploadRole: iam.Role;

  constructor(scope: Construct, id: string, props: BackendStorageProps) {
    super(scope, id);

    const versioned = props.enableBucketVersioning ?? false;
    const removalPolicy = props.removalPolicy ?? cdk.RemovalPolicy.DESTROY;
    const bucketDefaults: s3.BucketProps = {
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      encryption: s3.BucketEncryption.S3_MANAGED,
      enforceSSL: true,
      versioned,
      removalPolicy,
    };

    // =========================================================================
    // 1. Buckets
    // =========================================================================
    this.dropboxBucket = new s3.Bucket(this, 'DropboxBucket', {
      ...bucketDefaults,
      bucketName: props.dropboxBucketName,
    });

    this.ingestBucket = new s3.Bucket(this, 'IngestBucket', {
      ...bucketDefaults,
      bucketName: props.ingestBucketName,
    });

    this.snapshotBucket = new s3.Bucket(this, 'SnapshotBucket', {
      ...bucketDefaults,
      bucketName: props.snapshotBucketName,
      lifecycleRules: [
        {
          id: 'expire-snapshots-90d',
          expiration: cdk.Duration.days(90),
        },
      ],
    });

    // =========================================================================
    // 2. Relay queues + arrival notifications
    // =========================================================================
    this.dropboxRelay = createRelayQueue(this, 'DropboxQueue', {
      queueName: props.dropboxQueueName ?? 'DropboxQueue',
      maxReceiveCount: props.maxReceiveCount,
      visibilityTimeout: props.visibilityTimeout,
    });
    addArrivalNotification(this.dropboxBucket, this.dropboxRelay, {
      prefix: props.dropboxKeyPrefix,
    });

    this.ingestRelay = createRelayQueue(this, 'IngestQueue', {
      queueName: props.ingestQueueName ?? 'IngestQueue',
      maxReceiveCount: props.maxReceiveCount,
      visibilityTimeout: props.visibilityTimeout,
    });
    addArrivalNotification(this.ingestBucket, this.ingestRelay);

    // =========================================================================
    // 3. Dropbox upload role
    // =========================================================================
    const uploadPolicy = new iam.ManagedPolicy(this, 'DropboxUploadPolicy', {
      managedPolicyName: DROPBOX_UPLOAD_POLICY_NAME,
      statements: [
        new iam.PolicyStatement({
          actions: ['s3:GetBucketLocation', 's3:ListAllMyBuckets'],
          resources: ['arn:aws:s3:::*'],
        }),
        new iam.PolicyStatement({
          actions: ['s3:ListBucket'],
          resources: [this.dropboxBucket.bucketArn],
        }),
        new iam.PolicyStatement({
          actions: ['s3:PutObject', 's3:DeleteObject'],
          resources: [this.dropboxBucket.arnForObjects('*')],
        }),
      ],
    });

    this.uploadRole = new iam.Role(this, 'DropboxUploadRole', {
      roleName: DROPBOX_UPLOAD_ROLE_NAME,
      description: 'Assumed by external producers to upload files into the dropbox bucket',
      assumedBy: new iam.AccountRootPrincipal(),
      managedPolicies: [uploadPolicy],
    });
  }
}
