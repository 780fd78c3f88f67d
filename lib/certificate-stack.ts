import * as cdk from 'aws-cdk-lib/core';
import * as acm from 'aws-cdk-lib/aws-certificatemanager';
import * as route53 from 'aws-cdk-lib/aws-route53';
import { Construct } from 'constructs';
import { Certificate } from './constructs/certificate';

export interface CertificateStackProps extends cdk.StackProps {
  /** Apex domain of the account's hosted zone */
  domainName: string;
  /** Use this zone instead of looking it up by domain name */
  hostedZone?: route53.IHostedZone;
}

/** CertificateStack issues the account's wildcard certificate. */
export class CertificateStack extends cdk.Stack {
  public readonly hostedZone: route53.IHostedZone;
  public readonly certificate: acm.ICertificate;

  constructor(scope: Construct, id: string, props: CertificateStackProps) {
    super(scope, id, props);

    const wildcard = new Certificate(this, 'Certificate', {
      domainName: props.domainName,
      hostedZone: props.hostedZone,
    });
    this.hostedZone = wildcard.hostedZone;
    this.certificate = wildcard.certificate;
  }
}
