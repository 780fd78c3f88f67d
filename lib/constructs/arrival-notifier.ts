import * as s3 from 'aws-cdk-lib/aws-s3';
import * as s3n from 'aws-cdk-lib/aws-s3-notifications';
import { ConfigurationError } from '../errors';
import { RelayQueue } from './relay-queue';

export interface ArrivalFilter {
  /** Only keys under this prefix are relayed, e.g. `received_files/`. */
  prefix?: string;
  suffix?: string;
}

/**
 * Publishes every object-created event on `bucket` to the relay queue.
 *
 * `SqsDestination` adds the queue policy statement that lets
 * `s3.amazonaws.com` send to the queue, scoped to this bucket's ARN, so the
 * permission is declared alongside the notification.
 */
export function addArrivalNotification(
  bucket: s3.IBucket,
  relay: RelayQueue,
  filter: ArrivalFilter = {},
): void {
  if (relay.fifo) {
    throw new ConfigurationError('S3 event notifications cannot target a FIFO queue', 'relay');
  }
  if (filter.prefix?.startsWith('/')) {
    throw new ConfigurationError(`object keys never start with "/", got "${filter.prefix}"`, 'prefix');
  }

  const keyFilters: s3.NotificationKeyFilter[] =
    filter.prefix || filter.suffix ? [{ prefix: filter.prefix, suffix: filter.suffix }] : [];

  bucket.addEventNotification(
    s3.EventType.OBJECT_CREATED,
    new s3n.SqsDestination(relay.queue),
    ...keyFilters,
  );
}
