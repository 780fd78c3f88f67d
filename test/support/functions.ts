import * as cdk from 'aws-cdk-lib/core';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import { Construct } from 'constructs';
import { ProcessingUnit } from '../../lib/constructs/processing-binding';

export interface InlineFunctionProps {
  /** Default: 1 minute */
  timeout?: cdk.Duration;
  environment?: Record<string, string>;
}

export function inlineFunction(scope: Construct, id: string, props: InlineFunctionProps = {}): lambda.Function {
  return new lambda.Function(scope, id, {
    runtime: lambda.Runtime.NODEJS_22_X,
    handler: 'index.handler',
    code: lambda.Code.fromInline('exports.handler = async () => undefined;'),
    timeout: props.timeout ?? cdk.Duration.minutes(1),
    environment: props.environment,
  });
}

export function inlineUnit(scope: Construct, id: string, props: InlineFunctionProps = {}): ProcessingUnit {
  return { fn: inlineFunction(scope, id, props) };
}
