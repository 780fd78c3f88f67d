import * as cdk from 'aws-cdk-lib/core';
import * as backup from 'aws-cdk-lib/aws-backup';
import { Construct } from 'constructs';

export interface BackupVaultProps {
  /** Default: data-center-backup-vault */
  vaultName?: string;
}

/** Account backup vault. Retained on stack deletion so recovery points survive. */
export class BackupVaultConstruct extends Construct {
  public readonly vault: backup.BackupVault;

  constructor(scope: Construct, id: string, props: BackupVaultProps = {}) {
    super(scope, id);

    this.vault = new backup.BackupVault(this, 'BackupVault', {
      backupVaultName: props.vaultName ?? 'data-center-backup-vault',
      removalPolicy: cdk.RemovalPolicy.RETAIN,
    });
  }
}
