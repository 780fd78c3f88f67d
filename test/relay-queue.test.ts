import * as cdk from 'aws-cdk-lib/core';
import { Template } from 'aws-cdk-lib/assertions';
import { createRelayQueue } from '../lib/constructs/relay-queue';
import { ConfigurationError } from '../lib/errors';

describe('createRelayQueue', () => {
  test('defaults to one delivery, 20 minute visibility and 14 day dead-letter retention', () => {
    const stack = new cdk.Stack();
    const relay = createRelayQueue(stack, 'DropboxQueue', { queueName: 'dropbox-queue' });

    expect(relay.maxReceiveCount).toBe(1);
    expect(relay.visibilityTimeout.toSeconds()).toBe(1200);
    expect(relay.fifo).toBe(false);

    const template = Template.fromStack(stack);
    template.hasResourceProperties('AWS::SQS::Queue', {
      QueueName: 'dropbox-queue',
      VisibilityTimeout: 1200,
      RedrivePolicy: { maxReceiveCount: 1 },
    });
    template.hasResourceProperties('AWS::SQS::Queue', {
      QueueName: 'dropbox-queue-dlq',
      MessageRetentionPeriod: 1209600,
    });
    template.resourceCountIs('AWS::SQS::Queue', 2);
  });

  test('uses an explicit dead-letter queue name', () => {
    const stack = new cdk.Stack();
    createRelayQueue(stack, 'Queue', { queueName: 'IngestQueue', deadLetterQueueName: 'DeadLetterQueue' });
    Template.fromStack(stack).hasResourceProperties('AWS::SQS::Queue', { QueueName: 'DeadLetterQueue' });
  });

  test.each([0, -1, 1.5, 1001])('rejects maxReceiveCount %p', (maxReceiveCount) => {
    const stack = new cdk.Stack();
    expect(() => createRelayQueue(stack, 'Queue', { queueName: 'q', maxReceiveCount }))
      .toThrow(ConfigurationError);
  });

  test('rejects a redelivery window that outlasts the dead-letter retention', () => {
    const stack = new cdk.Stack();
    expect(() => createRelayQueue(stack, 'Queue', {
      queueName: 'q',
      maxReceiveCount: 3,
      visibilityTimeout: cdk.Duration.hours(12),
      deadLetterRetention: cdk.Duration.days(1),
    })).toThrow(/^maxReceiveCount: redelivery window of 3 x 43200s/);
  });

  test('rejects a redelivery window equal to the dead-letter retention', () => {
    const stack = new cdk.Stack();
    expect(() => createRelayQueue(stack, 'Queue', {
      queueName: 'q',
      maxReceiveCount: 2,
      visibilityTimeout: cdk.Duration.hours(12),
      deadLetterRetention: cdk.Duration.days(1),
    })).toThrow(ConfigurationError);
  });

  test('accepts the largest receive count that fits the default retention', () => {
    const stack = new cdk.Stack();
    const relay = createRelayQueue(stack, 'Queue', { queueName: 'q', maxReceiveCount: 1000 });
    expect(relay.maxReceiveCount).toBe(1000);
  });

  test('rejects a visibility timeout above 12 hours', () => {
    const stack = new cdk.Stack();
    expect(() => createRelayQueue(stack, 'Queue', {
      queueName: 'q',
      visibilityTimeout: cdk.Duration.hours(13),
    })).toThrow(/^visibilityTimeout:/);
  });

  test('rejects a dead-letter retention outside SQS limits', () => {
    const stack = new cdk.Stack();
    expect(() => createRelayQueue(stack, 'Queue', {
      queueName: 'q',
      visibilityTimeout: cdk.Duration.seconds(0),
      deadLetterRetention: cdk.Duration.days(15),
    })).toThrow(/^deadLetterRetention:/);
  });

  describe('strict ordering', () => {
    test('creates FIFO queue and dead-letter queue', () => {
      const stack = new cdk.Stack();
      const relay = createRelayQueue(stack, 'Queue', { queueName: 'orders.fifo', fifo: true });

      expect(relay.fifo).toBe(true);
      const template = Template.fromStack(stack);
      template.hasResourceProperties('AWS::SQS::Queue', { QueueName: 'orders.fifo', FifoQueue: true });
      template.hasResourceProperties('AWS::SQS::Queue', { QueueName: 'orders-dlq.fifo', FifoQueue: true });
    });

    test('requires the .fifo suffix', () => {
      const stack = new cdk.Stack();
      expect(() => createRelayQueue(stack, 'Queue', { queueName: 'orders', fifo: true }))
        .toThrow(/^queueName:/);
    });
  });
});
