import * as cdk from 'aws-cdk-lib/core';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as lambdaEventSources from 'aws-cdk-lib/aws-lambda-event-sources';
import { ConfigurationError } from '../errors';
import { durationSeconds, validateIntegerInRange } from '../validation';
import { Environment, injectEnvironment } from './environment-merge';
import { RelayQueue } from './relay-queue';

/** A user-supplied function that consumes a relay queue. */
export interface ProcessingUnit {
  readonly fn: lambda.Function;
}

/** Lambda's timeout when a function does not set one. */
export const DEFAULT_FUNCTION_TIMEOUT = cdk.Duration.seconds(3);

export interface ProcessingBindingOptions {
  /** Variables added to the function unless it already defines them. */
  requiredEnvironment: Environment;
  /** Messages per invocation. Default: 1. */
  batchSize?: number;
  /** Let the function report partial batch failures instead of failing the whole batch. */
  reportBatchItemFailures?: boolean;
}

export interface ProcessingBinding {
  readonly eventSource: lambdaEventSources.SqsEventSource;
  /** Keys that were added to the function's environment by this binding. */
  readonly injectedKeys: string[];
}

/**
 * Subscribes a processing unit to a relay queue.
 *
 * The queue must hide an in-flight message for longer than the function can
 * run, otherwise a second copy is delivered while the first is still being
 * processed. The event source mapping also grants the function permission to
 * receive and delete messages.
 */
export function bindProcessingUnit(
  relay: RelayQueue,
  unit: ProcessingUnit,
  options: ProcessingBindingOptions,
): ProcessingBinding {
  const batchSize = validateIntegerInRange(options.batchSize ?? 1, 1, 10, 'batchSize');
  const timeoutSeconds = durationSeconds(unit.fn.timeout ?? DEFAULT_FUNCTION_TIMEOUT, 'timeout');
  const visibilitySeconds = durationSeconds(relay.visibilityTimeout, 'visibilityTimeout');
  if (visibilitySeconds <= timeoutSeconds) {
    throw new ConfigurationError(
      `relay visibility timeout (${visibilitySeconds}s) must exceed the function timeout (${timeoutSeconds}s)`,
      'timeout',
    );
  }

  const eventSource = new lambdaEventSources.SqsEventSource(relay.queue, {
    batchSize,
    reportBatchItemFailures: options.reportBatchItemFailures,
  });
  unit.fn.addEventSource(eventSource);

  const injectedKeys = injectEnvironment(unit.fn, options.requiredEnvironment);
  return { eventSource, injectedKeys };
}
