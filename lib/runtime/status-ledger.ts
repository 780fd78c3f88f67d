import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, GetCommand, PutCommand } from '@aws-sdk/lib-dynamodb';
import { DropboxEnv, STATUS_TABLE_PARTITION_KEY } from '../constants';
import { ConfigurationError, StatusLedgerError } from '../errors';
import { Logger } from './logger';
import { StatusItem, StatusItemSchema, StatusMetadataSchema, StatusRecord, toStatusRecord } from './status-record';

export interface StatusLedgerOptions {
  tableName: string;
  region?: string;
  logger?: Logger;
  /** Clock used to stamp writes. */
  now?: () => Date;
}

/**
 * StatusLedger - per-item processing status for the ingest pipeline.
 *
 * Writes are unconditional: concurrent writers for the same item race and the
 * last one wins. Records are never deleted here.
 */
export class StatusLedger {
  private readonly dynamoClient: DynamoDBDocumentClient;
  private readonly logger: Logger;
  private readonly now: () => Date;
  readonly tableName: string;

  constructor(options: StatusLedgerOptions) {
    if (!options.tableName) {
      throw new ConfigurationError('a table name is required', 'tableName');
    }
    this.tableName = options.tableName;
    this.logger = options.logger ?? new Logger('StatusLedger');
    this.now = options.now ?? (() => new Date());

    const client = new DynamoDBClient({ region: options.region });
    this.dynamoClient = DynamoDBDocumentClient.from(client, {
      marshallOptions: {
        removeUndefinedValues: true,
      },
    });
  }

  /** Builds a ledger for the table named by INGEST_STATUS_TABLE. */
  static fromEnvironment(
    env: NodeJS.ProcessEnv = process.env,
    options: Omit<StatusLedgerOptions, 'tableName'> = {},
  ): StatusLedger {
    const tableName = env[DropboxEnv.INGEST_STATUS_TABLE];
    if (!tableName) {
      throw new ConfigurationError('environment variable is not set', DropboxEnv.INGEST_STATUS_TABLE);
    }
    return new StatusLedger({ ...options, tableName, region: options.region ?? env.AWS_REGION });
  }

  /**
   * Create or overwrite the status of an item.
   *
   * Metadata must be plain JSON with safe-integer numbers; anything else is
   * rejected before the write.
   */
  async put(itemId: string, status: string, metadata: Record<string, unknown> = {}): Promise<StatusRecord> {
    if (!itemId) {
      throw new ConfigurationError('must be a non-empty string', 'itemId');
    }
    const checked = StatusMetadataSchema.safeParse(metadata);
    if (!checked.success) {
      const issue = checked.error.issues[0];
      throw new ConfigurationError(`${issue.message} at ${issue.path.join('.')}`, 'metadata');
    }
    const item: StatusItem = {
      [STATUS_TABLE_PARTITION_KEY]: itemId,
      status,
      timestamp: this.now().toISOString(),
      metadata: checked.data,
    };

    try {
      await this.dynamoClient.send(new PutCommand({
        TableName: this.tableName,
        Item: item,
      }));

      this.logger.debug('Status recorded', { itemId, status });
      return toStatusRecord(item);
    } catch (error) {
      this.logger.error('Failed to record status', {
        itemId,
        status,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /**
   * Latest status of an item, or null if nothing has been recorded for it.
   */
  async get(itemId: string): Promise<StatusRecord | null> {
    if (!itemId) {
      throw new ConfigurationError('must be a non-empty string', 'itemId');
    }

    let stored: Record<string, unknown> | undefined;
    try {
      const result = await this.dynamoClient.send(new GetCommand({
        TableName: this.tableName,
        Key: { [STATUS_TABLE_PARTITION_KEY]: itemId },
        ConsistentRead: true,
      }));
      stored = result.Item;
    } catch (error) {
      this.logger.error('Failed to read status', {
        itemId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    if (!stored) {
      return null;
    }

    const parsed = StatusItemSchema.safeParse(stored);
    if (!parsed.success) {
      this.logger.warn('Malformed status item', { itemId, issues: parsed.error.issues });
      throw new StatusLedgerError(`Malformed status item: ${parsed.error.message}`, itemId);
    }
    return toStatusRecord(parsed.data);
  }
}
