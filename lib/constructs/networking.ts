import * as ec2 from 'aws-cdk-lib/aws-ec2';
import { Construct } from 'constructs';
import { validateCidr, validateIntegerInRange } from '../validation';

export interface NetworkingProps {
  /** Default: 10.1.0.0/16 */
  cidr?: string;
  /** Default: 2 */
  maxAzs?: number;
}

/**
 * VPC with one public and one isolated /24 per availability zone and no NAT
 * gateways. Isolated subnets reach AWS services through endpoints only.
 */
export class Networking extends Construct {
  public readonly vpc: ec2.Vpc;

  constructor(scope: Construct, id: string, props: NetworkingProps = {}) {
    super(scope, id);

    const cidr = validateCidr(props.cidr ?? '10.1.0.0/16', 'cidr');
    const maxAzs = validateIntegerInRange(props.maxAzs ?? 2, 1, 6, 'maxAzs');

    this.vpc = new ec2.Vpc(this, 'Vpc', {
      ipAddresses: ec2.IpAddresses.cidr(cidr),
      maxAzs,
      natGateways: 0,
      enableDnsHostnames: true,
      enableDnsSupport: true,
      subnetConfiguration: [
        { name: 'Public', subnetType: ec2.SubnetType.PUBLIC, cidrMask: 24 },
        { name: 'Isolated', subnetType: ec2.SubnetType.PRIVATE_ISOLATED, cidrMask: 24 },
      ],
    });
  }
}
