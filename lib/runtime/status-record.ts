import { z } from 'zod';

/** Values the DynamoDB marshaller can store and read back unchanged. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue | undefined };

// Undefined object members are dropped on write (removeUndefinedValues).
const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite().min(-Number.MAX_SAFE_INTEGER).max(Number.MAX_SAFE_INTEGER),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema.optional()),
  ]),
);

export const StatusMetadataSchema = z.record(JsonValueSchema.optional());

/** Item layout in the status table. */
export const StatusItemSchema = z.object({
  item_id: z.string().min(1),
  status: z.string(),
  timestamp: z.string().datetime(),
  metadata: StatusMetadataSchema.default({}),
});

export type StatusMetadata = z.infer<typeof StatusMetadataSchema>;
export type StatusItem = z.infer<typeof StatusItemSchema>;

export interface StatusRecord {
  itemId: string;
  status: string;
  /** ISO-8601 time of the write that produced this record. */
  timestamp: string;
  metadata: StatusMetadata;
}

export function toStatusRecord(item: StatusItem): StatusRecord {
  return {
    itemId: item.item_id,
    status: item.status,
    timestamp: item.timestamp,
    metadata: item.metadata,
  };
}
