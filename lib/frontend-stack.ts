import * as cdk from 'aws-cdk-lib/core';
import * as cloudfront from 'aws-cdk-lib/aws-cloudfront';
import * as route53 from 'aws-cdk-lib/aws-route53';
import * as s3 from 'aws-cdk-lib/aws-s3';
import { Construct } from 'constructs';
import { ConfigurationError } from './errors';
import { FrontendSite } from './constructs/frontend-site';

export interface FrontendStackProps extends cdk.StackProps {
  /** Apex domain the site is served on */
  domainName: string;
  /** CIDR block allowed through the WAF */
  wafIpRange: string;
  /** Use this zone instead of looking it up by domain name */
  hostedZone?: route53.IHostedZone;
}

/**
 * FrontendStack hosts the data center's static site.
 *
 * The bucket lives in this stack with the distribution so the OAC bucket
 * policy is written by CDK without a cross-stack cycle.
 *
 * Must be deployed to us-east-1 (CloudFront-scoped WAF).
 */
export class FrontendStack extends cdk.Stack {
  public readonly siteBucket: s3.Bucket;
  public readonly distribution: cloudfront.Distribution;

  constructor(scope: Construct, id: string, props: FrontendStackProps) {
    super(scope, id, props);

    if (!props.domainName) {
      throw new ConfigurationError('is required', 'domainName');
    }
    const hostedZone = props.hostedZone
      ?? route53.HostedZone.fromLookup(this, 'HostedZone', { domainName: props.domainName });

    // Bucket named after the site so it is recognisable in the console.
    this.siteBucket = new s3.Bucket(this, 'SiteBucket', {
      bucketName: props.domainName,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      encryption: s3.BucketEncryption.S3_MANAGED,
      objectOwnership: s3.ObjectOwnership.BUCKET_OWNER_ENFORCED,
      enforceSSL: true,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
    });

    const site = new FrontendSite(this, 'Site', {
      hostedZone,
      siteBucket: this.siteBucket,
      wafIpRange: props.wafIpRange,
    });
    this.distribution = site.distribution;

    new cdk.CfnOutput(this, 'DistributionDomainName', {
      value: this.distribution.distributionDomainName,
      description: 'CloudFront distribution domain name',
    });

    new cdk.CfnOutput(this, 'DistributionId', {
      value: this.distribution.distributionId,
      description: 'CloudFront distribution ID (for cache invalidation)',
    });

    new cdk.CfnOutput(this, 'SiteBucketName', {
      value: this.siteBucket.bucketName,
      description: 'Frontend S3 bucket name',
    });

    new cdk.CfnOutput(this, 'IdentityPoolId', {
      value: site.identityPool.ref,
      description: 'Guest Cognito identity pool ID',
    });
  }
}
