import * as cdk from 'aws-cdk-lib/core';
import * as acm from 'aws-cdk-lib/aws-certificatemanager';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as events from 'aws-cdk-lib/aws-events';
import * as targets from 'aws-cdk-lib/aws-events-targets';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as opensearch from 'aws-cdk-lib/aws-opensearchservice';
import * as route53 from 'aws-cdk-lib/aws-route53';
import * as s3 from 'aws-cdk-lib/aws-s3';
import { Construct } from 'constructs';
import { DEFAULT_CONSOLE_LOG_LEVEL, OPENSEARCH_SNAPSHOT_REPO_NAME, SnapshotEnv } from '../constants';
import { ConfigurationError } from '../errors';
import { validateCidr, validateIntegerInRange } from '../validation';
import { injectEnvironment } from './environment-merge';

export const LOOPBACK_ACCESS_RANGE = '127.0.0.1/32';

export interface SearchDomainProps {
  /** OpenSearch domain name (3-28 lowercase characters). */
  domainName: string;
  /** Zone whose `search.` subdomain becomes the custom endpoint. */
  hostedZone: route53.IHostedZone;
  /** Certificate covering `search.<zone>`. */
  certificate: acm.ICertificate;
  /** Bucket registered as the manual snapshot repository. */
  snapshotBucket: s3.IBucket;
  /** Default: OpenSearch 2.9 */
  engineVersion?: opensearch.EngineVersion;
  /** CIDR blocks allowed to call the domain (default: loopback only, which blocks all real clients) */
  ipAccessRanges?: string[];
  /** Default: 1 */
  dataNodeCount?: number;
  /** Default: t3.medium.search */
  dataNodeInstanceType?: string;
  /** Dedicated manager nodes (default: none) */
  managerNodeCount?: number;
  /** Default: t3.medium.search */
  managerNodeInstanceType?: string;
  /** EBS volume per data node, in GiB (default: 50) */
  volumeSizeGiB?: number;
  /** Spread nodes across availability zones. Needs an even data node count. */
  zoneAwareness?: boolean;
  /** Create the es.amazonaws.com service-linked role (default: true; set false if the account already has it) */
  createServiceLinkedRole?: boolean;
  /** Function that takes scheduled snapshots into the snapshot bucket */
  snapshotFunction?: lambda.Function;
  /** Default: daily at 09:00 UTC */
  snapshotSchedule?: events.Schedule;
  /** Default: RETAIN */
  removalPolicy?: cdk.RemovalPolicy;
}

/**
 * SearchDomain creates the OpenSearch domain that ingested records land in,
 * plus the IAM role OpenSearch assumes to write snapshots into S3.
 *
 * Access is IP-based: anonymous principals are allowed from `ipAccessRanges`
 * only, and every request must use HTTPS.
 */
export class SearchDomain extends Construct {
  public readonly domain: opensearch.Domain;
  public readonly snapshotRole: iam.Role;
  public readonly customEndpoint: string;
  public readonly snapshotRule?: events.Rule;

  constructor(scope: Construct, id: string, props: SearchDomainProps) {
    super(scope, id);

    const ipAccessRanges = (props.ipAccessRanges ?? [LOOPBACK_ACCESS_RANGE])
      .map((range) => validateCidr(range, 'ipAccessRanges'));
    if (ipAccessRanges.length === 0) {
      throw new ConfigurationError('at least one CIDR block is required', 'ipAccessRanges');
    }
    if (ipAccessRanges.every((range) => range === LOOPBACK_ACCESS_RANGE)) {
      cdk.Annotations.of(this).addWarningV2(
        'search-domain:loopbackAccessRange',
        `Domain access is limited to ${LOOPBACK_ACCESS_RANGE}; pass ipAccessRanges to reach it from your network.`,
      );
    }

    const dataNodes = validateIntegerInRange(props.dataNodeCount ?? 1, 1, 80, 'dataNodeCount');
    const managerNodes = validateIntegerInRange(props.managerNodeCount ?? 0, 0, 5, 'managerNodeCount');
    const volumeSize = validateIntegerInRange(props.volumeSizeGiB ?? 50, 10, 16384, 'volumeSizeGiB');
    if (props.zoneAwareness && dataNodes % 2 !== 0) {
      throw new ConfigurationError('zone awareness needs an even number of data nodes', 'dataNodeCount');
    }

    this.customEndpoint = `search.${props.hostedZone.zoneName}`;

    // =========================================================================
    // 1. Domain
    // =========================================================================
    this.domain = new opensearch.Domain(this, 'Domain', {
      domainName: props.domainName,
      version: props.engineVersion ?? opensearch.EngineVersion.openSearch('2.9'),
      capacity: {
        dataNodes,
        dataNodeInstanceType: props.dataNodeInstanceType ?? 't3.medium.search',
        masterNodes: managerNodes > 0 ? managerNodes : undefined,
        masterNodeInstanceType: managerNodes > 0
          ? props.managerNodeInstanceType ?? 't3.medium.search'
          : undefined,
      },
      ebs: {
        volumeSize,
        volumeType: ec2.EbsDeviceVolumeType.GP3,
      },
      zoneAwareness: props.zoneAwareness ? { enabled: true, availabilityZoneCount: 2 } : undefined,
      logging: {
        slowSearchLogEnabled: true,
        slowIndexLogEnabled: true,
        appLogEnabled: true,
      },
      nodeToNodeEncryption: true,
      encryptionAtRest: { enabled: true },
      enforceHttps: true,
      customEndpoint: {
        domainName: this.customEndpoint,
        certificate: props.certificate,
        hostedZone: props.hostedZone,
      },
      removalPolicy: props.removalPolicy ?? cdk.RemovalPolicy.RETAIN,
    });

    if (props.createServiceLinkedRole ?? true) {
      const serviceLinkedRole = new cdk.CfnResource(this, 'ServiceLinkedRole', {
        type: 'AWS::IAM::ServiceLinkedRole',
        properties: {
          AWSServiceName: 'es.amazonaws.com',
          Description: 'Role for OpenSearch to access resources in the VPC',
        },
      });
      this.domain.node.addDependency(serviceLinkedRole);
    }

    this.domain.addAccessPolicies(new iam.PolicyStatement({
      principals: [new iam.AnyPrincipal()],
      actions: ['es:*'],
      resources: [this.domain.domainArn, `${this.domain.domainArn}/*`],
      conditions: {
        IpAddress: { 'aws:SourceIp': ipAccessRanges },
      },
    }));

    // =========================================================================
    // 2. Snapshot role
    // =========================================================================
    const stack = cdk.Stack.of(this);
    this.snapshotRole = new iam.Role(this, 'SnapshotRole', {
      description: 'Assumed by OpenSearch to read and write manual snapshots',
      assumedBy: new iam.PrincipalWithConditions(new iam.ServicePrincipal('es.amazonaws.com'), {
        StringEquals: { 'aws:SourceAccount': stack.account },
        ArnLike: { 'aws:SourceArn': this.domain.domainArn },
      }),
    });

    const snapshotPolicy = new iam.ManagedPolicy(this, 'SnapshotPolicy', {
      statements: [
        new iam.PolicyStatement({
          actions: ['s3:ListBucket'],
          resources: [props.snapshotBucket.bucketArn],
        }),
        new iam.PolicyStatement({
          actions: ['s3:GetObject', 's3:PutObject', 's3:DeleteObject'],
          resources: [props.snapshotBucket.arnForObjects('*')],
        }),
      ],
    });
    this.snapshotRole.addManagedPolicy(snapshotPolicy);

    // =========================================================================
    // 3. Scheduled snapshots (optional)
    // =========================================================================
    if (props.snapshotFunction) {
      const snapshotFn = props.snapshotFunction;
      injectEnvironment(snapshotFn, {
        [SnapshotEnv.OPEN_SEARCH_ENDPOINT]: `https://${this.domain.domainEndpoint}/`,
        [SnapshotEnv.SNAPSHOT_S3_BUCKET]: props.snapshotBucket.bucketName,
        [SnapshotEnv.SNAPSHOT_ROLE_ARN]: this.snapshotRole.roleArn,
        [SnapshotEnv.SNAPSHOT_REPO_NAME]: OPENSEARCH_SNAPSHOT_REPO_NAME,
        [SnapshotEnv.CONSOLE_LOG_LEVEL]: DEFAULT_CONSOLE_LOG_LEVEL,
      });
      this.domain.grantReadWrite(snapshotFn);
      this.snapshotRole.grantPassRole(snapshotFn.grantPrincipal);

      this.snapshotRule = new events.Rule(this, 'SnapshotSchedule', {
        description: 'Triggers a manual OpenSearch snapshot',
        schedule: props.snapshotSchedule ?? events.Schedule.cron({ minute: '0', hour: '9' }),
      });
      this.snapshotRule.addTarget(new targets.LambdaFunction(snapshotFn));
    }
  }
}
