import * as cdk from 'aws-cdk-lib/core';
import * as s3 from 'aws-cdk-lib/aws-s3';
import { Match, Template } from 'aws-cdk-lib/assertions';
import { addArrivalNotification } from '../lib/constructs/arrival-notifier';
import { createRelayQueue } from '../lib/constructs/relay-queue';
import { ConfigurationError } from '../lib/errors';

describe('addArrivalNotification', () => {
  test('publishes object-created events under the prefix to the relay queue', () => {
    const stack = new cdk.Stack();
    const bucket = new s3.Bucket(stack, 'Dropbox');
    const relay = createRelayQueue(stack, 'DropboxQueue', { queueName: 'dropbox-queue' });

    addArrivalNotification(bucket, relay, { prefix: 'received_files/' });

    Template.fromStack(stack).hasResourceProperties('Custom::S3BucketNotifications', {
      NotificationConfiguration: {
        QueueConfigurations: [
          Match.objectLike({
            Events: ['s3:ObjectCreated:*'],
            Filter: { Key: { FilterRules: [{ Name: 'prefix', Value: 'received_files/' }] } },
          }),
        ],
      },
    });
  });

  test('relays every key when no filter is given', () => {
    const stack = new cdk.Stack();
    const bucket = new s3.Bucket(stack, 'Ingest');
    const relay = createRelayQueue(stack, 'IngestQueue', { queueName: 'ingest-queue' });

    addArrivalNotification(bucket, relay);

    Template.fromStack(stack).hasResourceProperties('Custom::S3BucketNotifications', {
      NotificationConfiguration: {
        QueueConfigurations: [
          Match.objectLike({ Events: ['s3:ObjectCreated:*'], Filter: Match.absent() }),
        ],
      },
    });
  });

  test('lets S3 send to the queue', () => {
    const stack = new cdk.Stack();
    const bucket = new s3.Bucket(stack, 'Dropbox');
    const relay = createRelayQueue(stack, 'DropboxQueue', { queueName: 'dropbox-queue' });

    addArrivalNotification(bucket, relay);

    Template.fromStack(stack).hasResourceProperties('AWS::SQS::QueuePolicy', {
      PolicyDocument: {
        Statement: Match.arrayWith([
          Match.objectLike({
            Effect: 'Allow',
            Principal: { Service: 's3.amazonaws.com' },
            Action: Match.arrayWith(['sqs:SendMessage']),
          }),
        ]),
      },
    });
  });

  test('leaves other buckets without notifications', () => {
    const stack = new cdk.Stack();
    const registered = new s3.Bucket(stack, 'Registered');
    new s3.Bucket(stack, 'Unregistered');
    const relay = createRelayQueue(stack, 'Queue', { queueName: 'q' });

    addArrivalNotification(registered, relay);

    Template.fromStack(stack).resourceCountIs('Custom::S3BucketNotifications', 1);
  });

  test('rejects a FIFO relay', () => {
    const stack = new cdk.Stack();
    const bucket = new s3.Bucket(stack, 'Dropbox');
    const relay = createRelayQueue(stack, 'Queue', { queueName: 'ordered.fifo', fifo: true });

    expect(() => addArrivalNotification(bucket, relay)).toThrow(ConfigurationError);
  });

  test('rejects a prefix with a leading slash', () => {
    const stack = new cdk.Stack();
    const bucket = new s3.Bucket(stack, 'Dropbox');
    const relay = createRelayQueue(stack, 'Queue', { queueName: 'q' });

    expect(() => addArrivalNotification(bucket, relay, { prefix: '/received_files/' }))
      .toThrow(/^prefix:/);
  });
});
