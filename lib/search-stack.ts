import * as cdk from 'aws-cdk-lib/core';
import * as acm from 'aws-cdk-lib/aws-certificatemanager';
import * as ecr from 'aws-cdk-lib/aws-ecr';
import * as opensearch from 'aws-cdk-lib/aws-opensearchservice';
import * as route53 from 'aws-cdk-lib/aws-route53';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as sns from 'aws-cdk-lib/aws-sns';
import { Construct } from 'constructs';
import { IndexArchival } from './constructs/index-archival';
import { createContainerProcessingUnit } from './constructs/lambda-factory';
import { SearchDomain } from './constructs/search-domain';

export interface SearchStackProps extends cdk.StackProps {
  /** OpenSearch domain name (default: data-center-search) */
  searchDomainName?: string;
  hostedZone: route53.IHostedZone;
  certificate: acm.ICertificate;
  /** Snapshot bucket from StorageStack */
  snapshotBucket: s3.IBucket;
  /** CIDR blocks allowed to reach the domain */
  ipAccessRanges?: string[];
  dataNodeCount?: number;
  dataNodeInstanceType?: string;
  /** Repository of the snapshot image; scheduled snapshots are off without it */
  snapshotRepo?: ecr.IRepository;
  /** Repository of the index archival image; archival is off without it */
  archivalRepo?: ecr.IRepository;
  /** Indexes above this size are archived (default: 10 GB) */
  indexSizeThresholdGb?: number;
  /** Topic for archival alerts */
  alarmTopic?: sns.ITopic;
}

/**
 * SearchStack owns the OpenSearch domain and, when their image repositories
 * are given, the daily snapshot function and the index archival workflow.
 */
export class SearchStack extends cdk.Stack {
  public readonly domain: opensearch.Domain;
  public readonly search: SearchDomain;
  public readonly archival?: IndexArchival;

  constructor(scope: Construct, id: string, props: SearchStackProps) {
    super(scope, id, props);

    const snapshotUnit = props.snapshotRepo
      ? createContainerProcessingUnit(this, 'SnapshotFunction', {
        description: 'Takes a manual OpenSearch snapshot into the snapshot bucket',
        repository: props.snapshotRepo,
        imageTag: 'snapshot-latest',
        timeout: cdk.Duration.minutes(5),
        memorySize: 256,
      })
      : undefined;

    this.search = new SearchDomain(this, 'Search', {
      domainName: props.searchDomainName ?? 'data-center-search',
      hostedZone: props.hostedZone,
      certificate: props.certificate,
      snapshotBucket: props.snapshotBucket,
      ipAccessRanges: props.ipAccessRanges,
      dataNodeCount: props.dataNodeCount,
      dataNodeInstanceType: props.dataNodeInstanceType,
      snapshotFunction: snapshotUnit?.fn,
    });
    this.domain = this.search.domain;

    if (props.archivalRepo) {
      const sunsetUnit = createContainerProcessingUnit(this, 'IndexSunsetFunction', {
        description: 'Archives OpenSearch indexes above the size threshold',
        repository: props.archivalRepo,
        imageTag: 'index-archival-latest',
        timeout: cdk.Duration.minutes(15),
        memorySize: 512,
      });

      this.archival = new IndexArchival(this, 'IndexArchival', {
        domain: this.domain,
        sunsetFunction: sunsetUnit.fn,
        alarmTopic: props.alarmTopic,
        indexSizeThresholdGb: props.indexSizeThresholdGb,
      });

      new cdk.CfnOutput(this, 'IndexArchivalStateMachineArn', {
        value: this.archival.stateMachine.stateMachineArn,
        description: 'State machine that archives oversized indexes',
      });
    }

    new cdk.CfnOutput(this, 'SearchEndpoint', {
      value: `https://${this.search.customEndpoint}`,
      description: 'OpenSearch custom endpoint',
    });

    new cdk.CfnOutput(this, 'SnapshotRoleArn', {
      value: this.search.snapshotRole.roleArn,
      description: 'Role passed to OpenSearch when registering the snapshot repository',
    });
  }
}
