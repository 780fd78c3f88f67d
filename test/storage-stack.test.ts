import { Match, Template } from 'aws-cdk-lib/assertions';
import { storage, registry } from './test-helpers';

describe('StorageStack (stateful: buckets, relay queues, backup vault)', () => {
  test('creates dropbox, ingest and snapshot buckets', () => {
    const template = Template.fromStack(storage);
    template.hasResourceProperties('AWS::S3::Bucket', {
      BucketName: 'data-center-dropbox-123456789012',
    });
    template.hasResourceProperties('AWS::S3::Bucket', {
      BucketName: 'data-center-ingest-123456789012',
    });
    template.hasResourceProperties('AWS::S3::Bucket', {
      BucketName: 'data-center-snapshots-123456789012',
      LifecycleConfiguration: {
        Rules: [{ ExpirationInDays: 90, Id: 'expire-snapshots-90d', Status: 'Enabled' }],
      },
    });
    template.resourceCountIs('AWS::S3::Bucket', 3);
  });

  test('creates relay queues with dead-letter queues', () => {
    const template = Template.fromStack(storage);
    template.hasResourceProperties('AWS::SQS::Queue', {
      QueueName: 'DropboxQueue',
      VisibilityTimeout: 1200,
      RedrivePolicy: { maxReceiveCount: 1 },
    });
    template.hasResourceProperties('AWS::SQS::Queue', {
      QueueName: 'IngestQueue',
      VisibilityTimeout: 1200,
      RedrivePolicy: { maxReceiveCount: 1 },
    });
    template.hasResourceProperties('AWS::SQS::Queue', {
      QueueName: 'DropboxQueue-dlq',
      MessageRetentionPeriod: 1209600,
    });
    template.resourceCountIs('AWS::SQS::Queue', 4);
  });

  test('notifies a relay for each of the dropbox and ingest buckets', () => {
    const template = Template.fromStack(storage);
    template.resourceCountIs('Custom::S3BucketNotifications', 2);
  });

  test('creates the dropbox upload role', () => {
    const template = Template.fromStack(storage);
    template.hasResourceProperties('AWS::IAM::Role', {
      RoleName: 'dropbox-upload-role',
    });
    template.hasResourceProperties('AWS::IAM::ManagedPolicy', {
      ManagedPolicyName: 'dropbox-upload-policy',
      PolicyDocument: {
        Statement: Match.arrayWith([
          Match.objectLike({ Action: ['s3:PutObject', 's3:DeleteObject'] }),
        ]),
      },
    });
  });

  test('creates a retained backup vault', () => {
    const template = Template.fromStack(storage);
    template.hasResource('AWS::Backup::BackupVault', {
      Properties: { BackupVaultName: 'data-center-backup-vault' },
      DeletionPolicy: 'Retain',
    });
  });

  test('has termination protection enabled', () => {
    expect(storage.terminationProtection).toBe(true);
  });
});

describe('RegistryStack (ECR repositories, no functions)', () => {
  test('creates dropbox, ingest, snapshot and index-archival repositories', () => {
    const template = Template.fromStack(registry);

    template.hasResourceProperties('AWS::ECR::Repository', {
      RepositoryName: 'data-center-dropbox',
    });
    template.hasResourceProperties('AWS::ECR::Repository', {
      RepositoryName: 'data-center-ingest',
    });
    template.hasResourceProperties('AWS::ECR::Repository', {
      RepositoryName: 'data-center-snapshot',
    });
    template.hasResourceProperties('AWS::ECR::Repository', {
      RepositoryName: 'data-center-index-archival',
    });
    template.resourceCountIs('AWS::ECR::Repository', 4);
  });
});
