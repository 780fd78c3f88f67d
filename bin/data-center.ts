#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib/core';
import { loadDataCenterConfig } from '../lib/config';
import { StorageStack } from '../lib/storage-stack';
import { RegistryStack } from '../lib/registry-stack';
import { CertificateStack } from '../lib/certificate-stack';
import { NetworkStack } from '../lib/network-stack';
import { SearchStack } from '../lib/search-stack';
import { IngestStack } from '../lib/ingest-stack';
import { FrontendStack } from '../lib/frontend-stack';

const app = new cdk.App();
const config = loadDataCenterConfig(app.node);

const env: cdk.Environment = {
  account: process.env.CDK_DEFAULT_ACCOUNT,
  region: process.env.CDK_DEFAULT_REGION || 'us-east-1',
};

// =========================================================================
// 1. Storage (STATEFUL): buckets, relay queues, backup vault
// =========================================================================
const storage = new StorageStack(app, 'DataCenterStorage', {
  env,
  resourcePrefix: config.resourcePrefix,
  enableBucketVersioning: config.enableBucketVersioning,
  enableBackups: config.enableBackups,
  dropboxKeyPrefix: config.dropboxKeyPrefix,
  maxReceiveCount: config.maxReceiveCount,
});

// =========================================================================
// 2. Registry: ECR repositories, deployed and seeded before compute
// =========================================================================
const registry = new RegistryStack(app, 'DataCenterRegistry', {
  env,
  resourcePrefix: config.resourcePrefix,
});

// =========================================================================
// 3. Certificate: wildcard certificate for the account zone
// =========================================================================
const certificate = new CertificateStack(app, 'DataCenterCertificate', {
  env,
  domainName: config.domainName,
});

// =========================================================================
// 4. Search: OpenSearch domain + scheduled snapshots + index archival
// =========================================================================
const search = new SearchStack(app, 'DataCenterSearch', {
  env,
  searchDomainName: config.searchDomainName,
  hostedZone: certificate.hostedZone,
  certificate: certificate.certificate,
  snapshotBucket: storage.backend.snapshotBucket,
  ipAccessRanges: config.ipAccessRanges,
  dataNodeCount: config.dataNodeCount,
  dataNodeInstanceType: config.dataNodeInstanceType,
  snapshotRepo: registry.snapshotRepo,
  archivalRepo: registry.archivalRepo,
  indexSizeThresholdGb: config.indexSizeThresholdGb,
});
search.addDependency(registry);

// =========================================================================
// 5. Ingest (STATELESS): processing functions + status table
// =========================================================================
const ingest = new IngestStack(app, 'DataCenterIngest', {
  env,
  storage: storage.backend,
  searchDomain: search.domain,
  dropboxRepo: registry.dropboxRepo,
  ingestRepo: registry.ingestRepo,
  backupVault: storage.backupVault,
});
ingest.addDependency(registry);

// =========================================================================
// 6. Network (optional)
// =========================================================================
if (config.enableVpc) {
  new NetworkStack(app, 'DataCenterNetwork', { env });
}

// =========================================================================
// 7. Frontend (optional, us-east-1 only): enabled by -c wafIpRange=<cidr>
// =========================================================================
if (config.wafIpRange) {
  new FrontendStack(app, 'DataCenterFrontend', {
    env: { account: env.account, region: 'us-east-1' },
    domainName: config.domainName,
    wafIpRange: config.wafIpRange,
  });
}

cdk.Tags.of(app).add('Project', config.resourcePrefix);

app.synth();
