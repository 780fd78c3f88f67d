import * as cdk from 'aws-cdk-lib/core';
import * as sqs from 'aws-cdk-lib/aws-sqs';
import { Construct } from 'constructs';
import { ConfigurationError } from '../errors';
import { durationSeconds, validateIntegerInRange } from '../validation';

const MAX_VISIBILITY_TIMEOUT_SECONDS = 43200;
const MIN_RETENTION_SECONDS = 60;
const MAX_RETENTION_SECONDS = 14 * 24 * 60 * 60;
const FIFO_SUFFIX = '.fifo';

export interface RelayQueueProps {
  /** Physical queue name. Must end in `.fifo` when `fifo` is set. */
  queueName: string;
  /** Physical dead-letter queue name. Defaults to the queue name with a `-dlq` suffix. */
  deadLetterQueueName?: string;
  /** How long a received message stays hidden from other consumers. Default: 20 minutes. */
  visibilityTimeout?: cdk.Duration;
  /** Deliveries before a message moves to the dead-letter queue. Default: 1. */
  maxReceiveCount?: number;
  /** Dead-letter retention. Default: 14 days (the SQS maximum). */
  deadLetterRetention?: cdk.Duration;
  /** Strict-ordering mode. S3 cannot notify FIFO queues, so these relays are fed by other producers. */
  fifo?: boolean;
}

/** Resource handles and effective retry settings of a relay queue. */
export interface RelayQueue {
  readonly queue: sqs.Queue;
  readonly deadLetterQueue: sqs.Queue;
  readonly maxReceiveCount: number;
  readonly visibilityTimeout: cdk.Duration;
  readonly fifo: boolean;
}

function deadLetterName(queueName: string, fifo: boolean): string {
  return fifo
    ? `${queueName.slice(0, -FIFO_SUFFIX.length)}-dlq${FIFO_SUFFIX}`
    : `${queueName}-dlq`;
}

/**
 * Creates a durable relay queue and its dead-letter queue.
 *
 * A message is delivered at most `maxReceiveCount` times; when the final
 * delivery fails the queue moves it to the dead-letter queue, where it is kept
 * for `deadLetterRetention`. The whole redelivery window
 * (`maxReceiveCount × visibilityTimeout`) must fit inside that retention, or a
 * message could age out before it is ever dead-lettered.
 */
export function createRelayQueue(
  scope: Construct,
  id: string,
  props: RelayQueueProps,
): RelayQueue {
  const fifo = props.fifo ?? false;
  const maxReceiveCount = validateIntegerInRange(props.maxReceiveCount ?? 1, 1, 1000, 'maxReceiveCount');
  const visibilityTimeout = props.visibilityTimeout ?? cdk.Duration.minutes(20);
  const deadLetterRetention = props.deadLetterRetention ?? cdk.Duration.days(14);

  const visibilitySeconds = durationSeconds(visibilityTimeout, 'visibilityTimeout');
  if (visibilitySeconds > MAX_VISIBILITY_TIMEOUT_SECONDS) {
    throw new ConfigurationError(
      `must not exceed ${MAX_VISIBILITY_TIMEOUT_SECONDS} seconds, got ${visibilitySeconds}`,
      'visibilityTimeout',
    );
  }

  const retentionSeconds = durationSeconds(deadLetterRetention, 'deadLetterRetention');
  if (retentionSeconds < MIN_RETENTION_SECONDS || retentionSeconds > MAX_RETENTION_SECONDS) {
    throw new ConfigurationError(
      `must be between ${MIN_RETENTION_SECONDS} and ${MAX_RETENTION_SECONDS} seconds, got ${retentionSeconds}`,
      'deadLetterRetention',
    );
  }

  if (maxReceiveCount * visibilitySeconds >= retentionSeconds) {
    throw new ConfigurationError(
      `redelivery window of ${maxReceiveCount} x ${visibilitySeconds}s must be shorter than ` +
        `the dead-letter retention of ${retentionSeconds}s`,
      'maxReceiveCount',
    );
  }

  if (fifo && !props.queueName.endsWith(FIFO_SUFFIX)) {
    throw new ConfigurationError(`FIFO queue names must end in "${FIFO_SUFFIX}"`, 'queueName');
  }

  const deadLetterQueue = new sqs.Queue(scope, `${id}DeadLetter`, {
    queueName: props.deadLetterQueueName ?? deadLetterName(props.queueName, fifo),
    retentionPeriod: deadLetterRetention,
    fifo: fifo || undefined,
  });

  const queue = new sqs.Queue(scope, id, {
    queueName: props.queueName,
    visibilityTimeout,
    fifo: fifo || undefined,
    deadLetterQueue: {
      queue: deadLetterQueue,
      maxReceiveCount,
    },
  });

  return { queue, deadLetterQueue, maxReceiveCount, visibilityTimeout, fifo };
}
