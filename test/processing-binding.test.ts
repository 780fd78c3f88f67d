import * as cdk from 'aws-cdk-lib/core';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import { Match, Template } from 'aws-cdk-lib/assertions';
import { bindProcessingUnit } from '../lib/constructs/processing-binding';
import { createRelayQueue } from '../lib/constructs/relay-queue';
import { ConfigurationError } from '../lib/errors';
import { inlineUnit } from './support/functions';

describe('bindProcessingUnit', () => {
  test('subscribes the function one message at a time', () => {
    const stack = new cdk.Stack();
    const relay = createRelayQueue(stack, 'Queue', { queueName: 'dropbox-queue' });
    const unit = inlineUnit(stack, 'Processor');

    bindProcessingUnit(relay, unit, { requiredEnvironment: {} });

    const template = Template.fromStack(stack);
    template.hasResourceProperties('AWS::Lambda::EventSourceMapping', {
      BatchSize: 1,
      EventSourceArn: { 'Fn::GetAtt': [Match.stringLikeRegexp('^Queue'), 'Arn'] },
    });
    template.hasResourceProperties('AWS::IAM::Policy', {
      PolicyDocument: {
        Statement: Match.arrayWith([
          Match.objectLike({ Action: Match.arrayWith(['sqs:ReceiveMessage']) }),
        ]),
      },
    });
  });

  test('injects the required environment without overriding the owner', () => {
    const stack = new cdk.Stack();
    const relay = createRelayQueue(stack, 'Queue', { queueName: 'ingest-queue' });
    const unit = inlineUnit(stack, 'Processor', { environment: { MAX_PROCESSES: '4' } });

    const binding = bindProcessingUnit(relay, unit, {
      requiredEnvironment: { MAX_PROCESSES: '25', CHUNK_SIZE_MB: '5' },
    });

    expect(binding.injectedKeys).toEqual(['CHUNK_SIZE_MB']);
    Template.fromStack(stack).hasResourceProperties('AWS::Lambda::Function', {
      Environment: { Variables: { MAX_PROCESSES: '4', CHUNK_SIZE_MB: '5' } },
    });
  });

  test('passes batch size and partial batch reporting through', () => {
    const stack = new cdk.Stack();
    const relay = createRelayQueue(stack, 'Queue', { queueName: 'q' });

    bindProcessingUnit(relay, inlineUnit(stack, 'Processor'), {
      requiredEnvironment: {},
      batchSize: 10,
      reportBatchItemFailures: true,
    });

    Template.fromStack(stack).hasResourceProperties('AWS::Lambda::EventSourceMapping', {
      BatchSize: 10,
      FunctionResponseTypes: ['ReportBatchItemFailures'],
    });
  });

  test('rejects a function that can outlive the visibility timeout', () => {
    const stack = new cdk.Stack();
    const relay = createRelayQueue(stack, 'Queue', {
      queueName: 'q',
      visibilityTimeout: cdk.Duration.minutes(5),
    });
    const unit = inlineUnit(stack, 'Processor', { timeout: cdk.Duration.minutes(5) });

    expect(() => bindProcessingUnit(relay, unit, { requiredEnvironment: {} }))
      .toThrow(/^timeout: relay visibility timeout \(300s\) must exceed the function timeout \(300s\)$/);
  });

  test('checks the timeout the function was actually built with', () => {
    const stack = new cdk.Stack();
    const relay = createRelayQueue(stack, 'Queue', {
      queueName: 'q',
      visibilityTimeout: cdk.Duration.minutes(5),
    });
    const fn = new lambda.Function(stack, 'Processor', {
      runtime: lambda.Runtime.NODEJS_22_X,
      handler: 'index.handler',
      code: lambda.Code.fromInline('exports.handler = async () => undefined;'),
      timeout: cdk.Duration.minutes(15),
    });

    expect(() => bindProcessingUnit(relay, { fn }, { requiredEnvironment: {} }))
      .toThrow(/^timeout: relay visibility timeout \(300s\) must exceed the function timeout \(900s\)$/);
  });

  test('falls back to the Lambda default timeout when none is set', () => {
    const stack = new cdk.Stack();
    const relay = createRelayQueue(stack, 'Queue', {
      queueName: 'q',
      visibilityTimeout: cdk.Duration.seconds(3),
    });
    const fn = new lambda.Function(stack, 'Processor', {
      runtime: lambda.Runtime.NODEJS_22_X,
      handler: 'index.handler',
      code: lambda.Code.fromInline('exports.handler = async () => undefined;'),
    });

    expect(() => bindProcessingUnit(relay, { fn }, { requiredEnvironment: {} }))
      .toThrow(/^timeout: relay visibility timeout \(3s\) must exceed the function timeout \(3s\)$/);
  });

  test.each([0, 11])('rejects batch size %p', (batchSize) => {
    const stack = new cdk.Stack();
    const relay = createRelayQueue(stack, 'Queue', { queueName: 'q' });

    expect(() => bindProcessingUnit(relay, inlineUnit(stack, 'Processor'), { requiredEnvironment: {}, batchSize }))
      .toThrow(ConfigurationError);
  });
});
