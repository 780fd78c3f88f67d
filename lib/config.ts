import { z } from 'zod';
import { ConfigurationError } from './errors';
import { validateCidr } from './validation';

/** Anything that exposes CDK context, typically `app.node`. */
export interface ContextSource {
  tryGetContext(key: string): unknown;
}

// `-c key=value` always arrives as a string, cdk.json values keep their JSON type.
const flag = (fallback: boolean) =>
  z.preprocess(
    (value) => (value === 'true' ? true : value === 'false' ? false : value),
    z.boolean().default(fallback),
  );

const count = (fallback: number, max: number) =>
  z.coerce.number().int().min(1).max(max).default(fallback);

const cidrList = z.preprocess(
  (value) => (typeof value === 'string' ? value.split(',').map((range) => range.trim()).filter(Boolean) : value),
  z.array(z.string()).min(1).default(['127.0.0.1/32']),
);

export const DataCenterConfigSchema = z.object({
  domainName: z.string().min(1),
  resourcePrefix: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'lowercase letters, digits and hyphens only').default('data-center'),
  searchDomainName: z.string().regex(/^[a-z][a-z0-9-]{2,27}$/, '3-28 characters, starting with a letter').default('data-center-search'),
  ipAccessRanges: cidrList,
  wafIpRange: z.string().optional(),
  dataNodeCount: count(1, 80),
  dataNodeInstanceType: z.string().default('t3.medium.search'),
  enableBucketVersioning: flag(false),
  enableBackups: flag(true),
  enableVpc: flag(false),
  maxReceiveCount: count(1, 1000),
  indexSizeThresholdGb: count(10, 16384),
  dropboxKeyPrefix: z.string().optional(),
});

export type DataCenterConfig = z.infer<typeof DataCenterConfigSchema>;

const CONTEXT_KEYS = Object.keys(DataCenterConfigSchema.shape);

/**
 * Reads and validates the deployment configuration from CDK context
 * (`cdk.json` or `-c key=value`).
 */
export function loadDataCenterConfig(source: ContextSource): DataCenterConfig {
  const raw: Record<string, unknown> = {};
  for (const key of CONTEXT_KEYS) {
    const value = source.tryGetContext(key);
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }

  const parsed = DataCenterConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(issue.message, issue.path.join('.') || undefined);
  }

  const config = parsed.data;
  config.ipAccessRanges.forEach((range) => validateCidr(range, 'ipAccessRanges'));
  if (config.wafIpRange !== undefined) {
    validateCidr(config.wafIpRange, 'wafIpRange');
  }
  return config;
}
