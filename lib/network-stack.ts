import * as cdk from 'aws-cdk-lib/core';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import { Construct } from 'constructs';
import { Networking } from './constructs/networking';

export interface NetworkStackProps extends cdk.StackProps {
  /** Default: 10.1.0.0/16 */
  cidr?: string;
}

/** NetworkStack creates the account VPC for workloads that need private networking. */
export class NetworkStack extends cdk.Stack {
  public readonly vpc: ec2.Vpc;

  constructor(scope: Construct, id: string, props?: NetworkStackProps) {
    super(scope, id, props);

    this.vpc = new Networking(this, 'Networking', { cidr: props?.cidr }).vpc;

    new cdk.CfnOutput(this, 'VpcId', {
      value: this.vpc.vpcId,
      description: 'Account VPC ID',
    });
  }
}
