import * as cdk from 'aws-cdk-lib/core';
import * as ecr from 'aws-cdk-lib/aws-ecr';
import { Construct } from 'constructs';

export interface RegistryStackProps extends cdk.StackProps {
  /** Prefix of every repository name (default: data-center) */
  resourcePrefix?: string;
}

/**
 * RegistryStack owns the ECR repositories of the processing functions.
 *
 * It contains no functions, so it can be deployed and seeded with images
 * before the stacks whose DockerImageFunctions pull from it.
 *
 * Bootstrap procedure:
 * 1. `cdk deploy DataCenterRegistry`
 * 2. Build and push the dropbox, ingest, snapshot and index-archival images
 * 3. `cdk deploy --all`
 */
export class RegistryStack extends cdk.Stack {
  public readonly dropboxRepo: ecr.Repository;
  public readonly ingestRepo: ecr.Repository;
  public readonly snapshotRepo: ecr.Repository;
  public readonly archivalRepo: ecr.Repository;

  constructor(scope: Construct, id: string, props?: RegistryStackProps) {
    super(scope, id, props);

    const prefix = props?.resourcePrefix ?? 'data-center';
    const repository = (repoId: string, name: string): ecr.Repository =>
      new ecr.Repository(this, repoId, {
        repositoryName: `${prefix}-${name}`,
        removalPolicy: cdk.RemovalPolicy.DESTROY,
        emptyOnDelete: true,
        lifecycleRules: [
          {
            maxImageCount: 10,
            description: 'Keep only the 10 most recent images',
          },
        ],
      });

    this.dropboxRepo = repository('DropboxImageRepo', 'dropbox');
    this.ingestRepo = repository('IngestImageRepo', 'ingest');
    this.snapshotRepo = repository('SnapshotImageRepo', 'snapshot');
    this.archivalRepo = repository('IndexArchivalImageRepo', 'index-archival');

    new cdk.CfnOutput(this, 'DropboxEcrRepoUri', {
      value: this.dropboxRepo.repositoryUri,
      description: 'ECR repository URI for the dropbox processing image',
    });

    new cdk.CfnOutput(this, 'IngestEcrRepoUri', {
      value: this.ingestRepo.repositoryUri,
      description: 'ECR repository URI for the ingest processing image',
    });

    new cdk.CfnOutput(this, 'SnapshotEcrRepoUri', {
      value: this.snapshotRepo.repositoryUri,
      description: 'ECR repository URI for the OpenSearch snapshot image',
    });

    new cdk.CfnOutput(this, 'IndexArchivalEcrRepoUri', {
      value: this.archivalRepo.repositoryUri,
      description: 'ECR repository URI for the index archival image',
    });
  }
}
