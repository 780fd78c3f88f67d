import * as cdk from 'aws-cdk-lib/core';
import * as events from 'aws-cdk-lib/aws-events';
import * as targets from 'aws-cdk-lib/aws-events-targets';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as opensearch from 'aws-cdk-lib/aws-opensearchservice';
import * as sns from 'aws-cdk-lib/aws-sns';
import * as sfn from 'aws-cdk-lib/aws-stepfunctions';
import * as tasks from 'aws-cdk-lib/aws-stepfunctions-tasks';
import { Construct } from 'constructs';
import { ArchivalEnv, DEFAULT_CONSOLE_LOG_LEVEL } from '../constants';
import { validateIntegerInRange } from '../validation';
import { injectEnvironment } from './environment-merge';

export interface IndexArchivalProps {
  /** Domain whose oversized indexes are archived. */
  domain: opensearch.IDomain;
  /**
   * Handles the `find_large_indexes`, `kickoff_archival`, `poll_reindex_task`
   * and `cleanup_archival` steps.
   */
  sunsetFunction: lambda.Function;
  /** Topic the sunset function publishes archival alerts to */
  alarmTopic?: sns.ITopic;
  /** Indexes above this size are archived (default: 10 GB) */
  indexSizeThresholdGb?: number;
  /** Default: every 24 hours */
  schedule?: events.Schedule;
  /** Wait between reindex polls (default: 150 seconds) */
  pollInterval?: cdk.Duration;
}

/**
 * IndexArchival moves indexes that have grown too large to query into fresh
 * archive indexes.
 *
 * Workflow: FindLargeIndexes -> Map(per index: Kickoff -> [reindex done?]
 * -> wait and poll | Cleanup | Fail), started by a scheduled rule.
 */
export class IndexArchival extends Construct {
  public readonly stateMachine: sfn.StateMachine;
  public readonly rule: events.Rule;

  constructor(scope: Construct, id: string, props: IndexArchivalProps) {
    super(scope, id);

    const thresholdGb = validateIntegerInRange(props.indexSizeThresholdGb ?? 10, 1, 16384, 'indexSizeThresholdGb');
    const sunsetFn = props.sunsetFunction;

    // =====================================================================
    // Sunset function environment and permissions
    // =====================================================================
    injectEnvironment(sunsetFn, {
      [ArchivalEnv.INDEX_SIZE_THRESHOLD_GB]: String(thresholdGb),
      [ArchivalEnv.OPEN_SEARCH_ENDPOINT]: props.domain.domainEndpoint,
      [ArchivalEnv.SNS_TOPIC_ARN]: props.alarmTopic?.topicArn ?? '',
      [ArchivalEnv.CONSOLE_LOG_LEVEL]: DEFAULT_CONSOLE_LOG_LEVEL,
    });

    sunsetFn.addToRolePolicy(new iam.PolicyStatement({
      actions: ['es:ESHttpGet', 'es:ESHttpPost', 'es:ESHttpPut', 'es:ESHttpDelete', 'es:ESHttpHead'],
      resources: [`${props.domain.domainArn}/*`],
    }));
    props.alarmTopic?.grantPublish(sunsetFn);

    // =====================================================================
    // Per-index flow
    // =====================================================================
    const findIndexes = new tasks.LambdaInvoke(this, 'FindLargeIndexes', {
      lambdaFunction: sunsetFn,
      payload: sfn.TaskInput.fromObject({ step: 'find_large_indexes' }),
      resultPath: '$.find_indexes',
      payloadResponseOnly: true,
    });

    // Blocks writes to the index, creates the archive index and starts an async reindex.
    const kickoff = new tasks.LambdaInvoke(this, 'KickoffIndexArchival', {
      lambdaFunction: sunsetFn,
      payload: sfn.TaskInput.fromObject({
        'step': 'kickoff_archival',
        'index.$': '$.index',
      }),
      resultPath: '$.kickoff',
      payloadResponseOnly: true,
    });

    const pollReindex = new tasks.LambdaInvoke(this, 'PollReindexTask', {
      lambdaFunction: sunsetFn,
      payload: sfn.TaskInput.fromObject({
        'step': 'poll_reindex_task',
        'index.$': '$.kickoff.index',
        'new_index.$': '$.kickoff.new_index',
        'task_id.$': '$.kickoff.task_id',
      }),
      resultPath: '$.kickoff',
      payloadResponseOnly: true,
    });

    const wait = new sfn.Wait(this, 'WaitForReindex', {
      time: sfn.WaitTime.duration(props.pollInterval ?? cdk.Duration.seconds(150)),
    });

    // Adds replicas to the archive index and deletes the original.
    const cleanup = new tasks.LambdaInvoke(this, 'CleanupArchival', {
      lambdaFunction: sunsetFn,
      payload: sfn.TaskInput.fromObject({
        'step': 'cleanup_archival',
        'index.$': '$.kickoff.index',
        'new_index.$': '$.kickoff.new_index',
      }),
      resultPath: '$.cleanup',
      payloadResponseOnly: true,
    });

    const reindexDone = new sfn.Choice(this, 'ReindexCompleted');
    reindexDone.when(
      sfn.Condition.stringEquals('$.kickoff.status', 'IN_PROGRESS'),
      wait.next(pollReindex).next(reindexDone),
    );
    reindexDone.when(sfn.Condition.stringEquals('$.kickoff.status', 'COMPLETED'), cleanup);
    reindexDone.otherwise(new sfn.Fail(this, 'ReindexFailed', {
      cause: 'Reindexing did not complete',
      error: 'TaskFailed',
    }));

    const archiveEachIndex = new sfn.Map(this, 'ArchiveEachIndex', {
      itemsPath: '$.find_indexes',
      itemSelector: { 'index.$': '$$.Map.Item.Value' },
      resultPath: '$.archived_indexes',
    });
    archiveEachIndex.itemProcessor(kickoff.next(reindexDone));

    // =====================================================================
    // State machine + schedule
    // =====================================================================
    this.stateMachine = new sfn.StateMachine(this, 'StateMachine', {
      comment: 'Archive OpenSearch indexes above the size threshold',
      definitionBody: sfn.DefinitionBody.fromChainable(findIndexes.next(archiveEachIndex)),
      timeout: cdk.Duration.hours(12),
      logs: {
        destination: new logs.LogGroup(this, 'StateMachineLogs', {
          retention: logs.RetentionDays.INFINITE,
          removalPolicy: cdk.RemovalPolicy.RETAIN,
        }),
        level: sfn.LogLevel.ALL,
      },
    });

    this.rule = new events.Rule(this, 'Schedule', {
      description: 'Starts the index archival state machine',
      schedule: props.schedule ?? events.Schedule.rate(cdk.Duration.hours(24)),
    });
    this.rule.addTarget(new targets.SfnStateMachine(this.stateMachine));
  }
}
