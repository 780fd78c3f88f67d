import * as cdk from 'aws-cdk-lib/core';
import * as acm from 'aws-cdk-lib/aws-certificatemanager';
import * as cloudfront from 'aws-cdk-lib/aws-cloudfront';
import * as origins from 'aws-cdk-lib/aws-cloudfront-origins';
import * as cognito from 'aws-cdk-lib/aws-cognito';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as route53 from 'aws-cdk-lib/aws-route53';
import * as route53Targets from 'aws-cdk-lib/aws-route53-targets';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as wafv2 from 'aws-cdk-lib/aws-wafv2';
import { Construct } from 'constructs';
import { ConfigurationError } from '../errors';
import { validateCidr } from '../validation';

/** CloudFront-scoped WAF resources can only be created in this region. */
export const FRONTEND_REGION = 'us-east-1';

export interface FrontendSiteProps {
  hostedZone: route53.IHostedZone;
  /** Bucket holding the site; content is served from `frontend/live/`. */
  siteBucket: s3.IBucket;
  /** Only this CIDR block may load the site. */
  wafIpRange: string;
}

/**
 * FrontendSite serves a static single-page app from S3 at the zone apex over
 * HTTPS, restricted by a WAF IP allow list.
 *
 * Also creates:
 * - a guest Cognito identity pool so the page can fetch CloudWatch widget images
 * - a deploy user and role allowed to publish under `frontend/` in the bucket
 */
export class FrontendSite extends Construct {
  public readonly distribution: cloudfront.Distribution;
  public readonly certificate: acm.Certificate;
  public readonly identityPool: cognito.CfnIdentityPool;
  public readonly deployRole: iam.Role;
  public readonly deployUser: iam.User;

  constructor(scope: Construct, id: string, props: FrontendSiteProps) {
    super(scope, id);

    const region = cdk.Stack.of(this).region;
    if (region !== FRONTEND_REGION) {
      throw new ConfigurationError(
        `the front end must be deployed to ${FRONTEND_REGION} for CloudFront WAF, got "${region}"`,
        'region',
      );
    }
    const wafIpRange = validateCidr(props.wafIpRange, 'wafIpRange');
    const websiteUrl = props.hostedZone.zoneName;

    // =========================================================================
    // 1. Guest identity pool
    // =========================================================================
    this.identityPool = new cognito.CfnIdentityPool(this, 'WebsiteIdentityPool', {
      identityPoolName: 'Website Identity Pool',
      allowUnauthenticatedIdentities: true,
    });

    const guestRole = new iam.Role(this, 'WebsiteGuestRole', {
      roleName: 'website-guest-role',
      assumedBy: new iam.FederatedPrincipal(
        'cognito-identity.amazonaws.com',
        {
          'StringEquals': { 'cognito-identity.amazonaws.com:aud': this.identityPool.ref },
          'ForAnyValue:StringLike': { 'cognito-identity.amazonaws.com:amr': 'unauthenticated' },
        },
        'sts:AssumeRoleWithWebIdentity',
      ),
    });
    guestRole.addToPolicy(new iam.PolicyStatement({
      actions: ['cognito-identity:GetCredentialsForIdentity', 'cloudwatch:GetMetricWidgetImage'],
      resources: ['*'],
    }));

    new cognito.CfnIdentityPoolRoleAttachment(this, 'IdentityPoolRoleAttachment', {
      identityPoolId: this.identityPool.ref,
      roles: { unauthenticated: guestRole.roleArn },
    });

    // =========================================================================
    // 2. Deploy user and role
    // =========================================================================
    this.deployUser = new iam.User(this, 'FrontendDeployUser', {
      userName: 'frontend-deploy-user',
    });

    this.deployRole = new iam.Role(this, 'FrontendDeployRole', {
      roleName: 'frontend-deploy-role',
      assumedBy: new iam.ArnPrincipal(this.deployUser.userArn),
      description: 'Role for automated frontend deployment',
    });

    new iam.ManagedPolicy(this, 'FrontendDeployPolicy', {
      managedPolicyName: 'frontend-deploy-policy',
      description: 'Publish site content under frontend/',
      roles: [this.deployRole],
      statements: [
        new iam.PolicyStatement({
          actions: ['s3:GetBucketLocation', 's3:ListAllMyBuckets'],
          resources: ['arn:aws:s3:::*'],
        }),
        new iam.PolicyStatement({
          actions: ['s3:ListBucket'],
          resources: [props.siteBucket.bucketArn],
        }),
        new iam.PolicyStatement({
          actions: ['s3:GetObject', 's3:PutObject', 's3:DeleteObject'],
          resources: [props.siteBucket.arnForObjects('frontend/*')],
        }),
      ],
    });

    // =========================================================================
    // 3. WAF allow list
    // =========================================================================
    const ipSet = new wafv2.CfnIPSet(this, 'AclIpSet', {
      name: 'WebACLIPRange',
      description: 'Web ACL IP Range',
      addresses: [wafIpRange],
      ipAddressVersion: 'IPV4',
      scope: 'CLOUDFRONT',
    });

    const webAcl = new wafv2.CfnWebACL(this, 'WebAcl', {
      name: 'waf-cloudfront',
      description: 'WAFv2 ACL for CloudFront',
      scope: 'CLOUDFRONT',
      customResponseBodies: {
        Custom401ErrorMessage: {
          content: 'Error: You are not on a network with access to this webpage.',
          contentType: 'TEXT_PLAIN',
        },
      },
      defaultAction: {
        block: {
          customResponse: {
            responseCode: 401,
            customResponseBodyKey: 'Custom401ErrorMessage',
          },
        },
      },
      visibilityConfig: {
        cloudWatchMetricsEnabled: true,
        metricName: 'WAF-CloudFront',
        sampledRequestsEnabled: true,
      },
      rules: [
        {
          name: 'ACLIPsOnly',
          priority: 0,
          statement: {
            ipSetReferenceStatement: { arn: ipSet.attrArn },
          },
          visibilityConfig: {
            cloudWatchMetricsEnabled: true,
            metricName: 'WafRuleACLIPsOnly',
            sampledRequestsEnabled: true,
          },
          action: { allow: {} },
        },
      ],
    });

    // =========================================================================
    // 4. Distribution
    // =========================================================================
    this.certificate = new acm.Certificate(this, 'SiteCertificate', {
      domainName: websiteUrl,
      validation: acm.CertificateValidation.fromDns(props.hostedZone),
    });

    this.distribution = new cloudfront.Distribution(this, 'Distribution', {
      comment: 'Static site frontend',
      defaultBehavior: {
        origin: origins.S3BucketOrigin.withOriginAccessControl(props.siteBucket, {
          originPath: '/frontend/live',
        }),
        viewerProtocolPolicy: cloudfront.ViewerProtocolPolicy.REDIRECT_TO_HTTPS,
        cachePolicy: cloudfront.CachePolicy.CACHING_DISABLED,
      },
      domainNames: [websiteUrl],
      certificate: this.certificate,
      priceClass: cloudfront.PriceClass.PRICE_CLASS_100,
      minimumProtocolVersion: cloudfront.SecurityPolicyProtocol.TLS_V1_2_2021,
      defaultRootObject: 'index.html',
      // Unknown paths are client-side routes.
      errorResponses: [
        {
          httpStatus: 403,
          responseHttpStatus: 200,
          responsePagePath: '/index.html',
          ttl: cdk.Duration.seconds(10),
        },
      ],
      webAclId: webAcl.attrArn,
    });

    new route53.ARecord(this, 'SiteAliasRecord', {
      zone: props.hostedZone,
      recordName: websiteUrl,
      target: route53.RecordTarget.fromAlias(new route53Targets.CloudFrontTarget(this.distribution)),
    });
  }
}
