import { DescribeSnapshotsCommand } from '@aws-sdk/client-ec2';
import type { LookupResult } from '../validators/common.js';
import type { SnapshotInfo, SnapshotLookup } from '../validators/ebs-validators.js';
import { createEc2Client } from './aws-clients.js';

const SNAPSHOT_NOT_FOUND_CODES = ['InvalidSnapshot.NotFound', 'InvalidSnapshot.Malformed'];

export async function getEbsSnapshotInfo(
  snapshotId: string,
  region: string
): Promise<LookupResult<SnapshotInfo>> {
  const client = createEc2Client(region);
  const command = new DescribeSnapshotsCommand({ SnapshotIds: [snapshotId] });

  try {
    const response = await client.send(command);
    const snapshot = response.Snapshots?.[0];

    if (!snapshot) {
      return { kind: 'not-found', message: `No snapshot returned for ${snapshotId}` };
    }

    return {
      kind: 'ok',
      value: {
        volumeSize: snapshot.VolumeSize,
        state: snapshot.State
      }
    };
  } catch (error) {
    if (!(error instanceof Error)) {
      throw error;
    }
    if (SNAPSHOT_NOT_FOUND_CODES.includes(error.name)) {
      return { kind: 'not-found', message: error.message };
    }
    return { kind: 'error', message: error.message };
  } finally {
    client.destroy();
  }
}

export function createSnapshotLookup(region: string): SnapshotLookup {
  return {
    getSnapshotInfo: (snapshotId) => getEbsSnapshotInfo(snapshotId, region)
  };
}
