import * as cdk from 'aws-cdk-lib/core';
import * as acm from 'aws-cdk-lib/aws-certificatemanager';
import * as route53 from 'aws-cdk-lib/aws-route53';
import { Construct } from 'constructs';
import { ConfigurationError } from '../errors';

export interface CertificateProps {
  /** Apex of the hosted zone, e.g. `example.org`. Used for the zone lookup when `hostedZone` is omitted. */
  domainName?: string;
  hostedZone?: route53.IHostedZone;
  /** Export name of the certificate ARN output (default: accountCertificateArn) */
  exportName?: string;
}

/** Wildcard certificate for every subdomain of the account's hosted zone, validated through DNS. */
export class Certificate extends Construct {
  public readonly hostedZone: route53.IHostedZone;
  public readonly certificate: acm.Certificate;

  constructor(scope: Construct, id: string, props: CertificateProps) {
    super(scope, id);

    if (props.hostedZone) {
      this.hostedZone = props.hostedZone;
    } else if (props.domainName) {
      this.hostedZone = route53.HostedZone.fromLookup(this, 'HostedZone', {
        domainName: props.domainName,
      });
    } else {
      throw new ConfigurationError('either hostedZone or domainName is required', 'domainName');
    }

    this.certificate = new acm.Certificate(this, 'WildcardCertificate', {
      domainName: `*.${this.hostedZone.zoneName}`,
      validation: acm.CertificateValidation.fromDns(this.hostedZone),
    });

    new cdk.CfnOutput(this, 'CertificateArn', {
      value: this.certificate.certificateArn,
      description: 'Wildcard certificate ARN',
      exportName: props.exportName ?? 'accountCertificateArn',
    });
  }
}
