import * as cdk from 'aws-cdk-lib/core';
import * as ecr from 'aws-cdk-lib/aws-ecr';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import { Construct } from 'constructs';
import { ProcessingUnit } from './processing-binding';

export interface ContainerFunctionConfig {
  description: string;
  repository: ecr.IRepository;
  /** Default: latest */
  imageTag?: string;
  timeout: cdk.Duration;
  memorySize: number;
  ephemeralStorageSize?: cdk.Size;
  environment?: Record<string, string>;
}

/** Creates a container-image Lambda from an ECR repository. */
export function createContainerProcessingUnit(
  scope: Construct,
  id: string,
  config: ContainerFunctionConfig,
): ProcessingUnit {
  const fn = new lambda.DockerImageFunction(scope, id, {
    description: config.description,
    code: lambda.DockerImageCode.fromEcr(config.repository, {
      tagOrDigest: config.imageTag ?? 'latest',
    }),
    architecture: lambda.Architecture.ARM_64,
    timeout: config.timeout,
    memorySize: config.memorySize,
    ephemeralStorageSize: config.ephemeralStorageSize,
    environment: config.environment,
  });
  return { fn };
}
