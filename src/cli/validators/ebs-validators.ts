import {
  EBS_VOLUME_IOPS_BOUNDS,
  EBS_VOLUME_TYPE_TO_IOPS_RATIO,
  EBS_VOLUME_TYPE_TO_VOLUME_SIZE_BOUNDS,
  GP3_MAX_THROUGHPUT_TO_IOPS_RATIO,
  GP3_THROUGHPUT_BOUNDS,
} from './ebs-bounds.js';
import { Validator, type FailureReporter, type LookupResult, type Param } from './common.js';

export interface SnapshotInfo {
  volumeSize?: number;
  state?: string;
}

export interface SnapshotLookup {
  getSnapshotInfo(snapshotId: string): Promise<LookupResult<SnapshotInfo>>;
}

interface TypeSizeParams {
  volumeType: Param<string>;
  volumeSize: Param<number>;
}

/**
 * Volume size must fall inside the closed interval for its type.
 * Types without size bounds are unconstrained.
 */
export class EbsVolumeTypeSizeValidator extends Validator<TypeSizeParams> {
  readonly name = 'EbsVolumeTypeSizeValidator';

  protected check({ volumeType, volumeSize }: TypeSizeParams, report: FailureReporter): void {
    const sizeBounds = EBS_VOLUME_TYPE_TO_VOLUME_SIZE_BOUNDS[volumeType.value];
    if (!sizeBounds) return;

    if (volumeSize.value > sizeBounds.max) {
      report(
        `The size of ${volumeType.value} volumes can not exceed ${sizeBounds.max} GiB`,
        'ERROR',
        [volumeSize],
      );
    } else if (volumeSize.value < sizeBounds.min) {
      report(
        `The size of ${volumeType.value} volumes must be at least ${sizeBounds.min} GiB`,
        'ERROR',
        [volumeSize],
      );
    }
  }
}

interface ThroughputParams {
  volumeType: Param<string>;
  volumeThroughput: Param<number | undefined>;
}

export class EbsVolumeThroughputValidator extends Validator<ThroughputParams> {
  readonly name = 'EbsVolumeThroughputValidator';

  protected check({ volumeType, volumeThroughput }: ThroughputParams, report: FailureReporter): void {
    if (volumeType.value !== 'gp3' || volumeThroughput.value === undefined) return;

    const { min, max } = GP3_THROUGHPUT_BOUNDS;
    if (volumeThroughput.value < min || volumeThroughput.value > max) {
      report(
        `Throughput must be between ${min} MB/s and ${max} MB/s when provisioning ${volumeType.value} volumes.`,
        'ERROR',
        [volumeThroughput],
      );
    }
  }
}

interface ThroughputIopsParams {
  volumeType: Param<string>;
  volumeIops: Param<number | undefined>;
  volumeThroughput: Param<number | undefined>;
}

export class EbsVolumeThroughputIopsValidator extends Validator<ThroughputIopsParams> {
  readonly name = 'EbsVolumeThroughputIopsValidator';

  protected check(
    { volumeType, volumeIops, volumeThroughput }: ThroughputIopsParams,
    report: FailureReporter,
  ): void {
    if (volumeType.value !== 'gp3') return;
    const throughput = volumeThroughput.value;
    const iops = volumeIops.value;
    if (!throughput || iops === undefined) return;

    if (throughput > iops * GP3_MAX_THROUGHPUT_TO_IOPS_RATIO) {
      report(
        `Throughput to IOPS ratio of ${throughput / iops} is too high; maximum is ${GP3_MAX_THROUGHPUT_TO_IOPS_RATIO}.`,
        'ERROR',
        [volumeThroughput],
      );
    }
  }
}

interface IopsParams {
  volumeType: Param<string>;
  volumeSize: Param<number>;
  volumeIops: Param<number | undefined>;
}

export class EbsVolumeIopsValidator extends Validator<IopsParams> {
  readonly name = 'EbsVolumeIopsValidator';

  protected check({ volumeType, volumeSize, volumeIops }: IopsParams, report: FailureReporter): void {
    const iopsBounds = EBS_VOLUME_IOPS_BOUNDS[volumeType.value];
    const iops = volumeIops.value;
    if (!iopsBounds || !iops) return;

    if (iops < iopsBounds.min || iops > iopsBounds.max) {
      report(
        `IOPS rate must be between ${iopsBounds.min} and ${iopsBounds.max} when provisioning ${volumeType.value} volumes.`,
        'ERROR',
        [volumeIops],
      );
      return;
    }

    const maxRatio = EBS_VOLUME_TYPE_TO_IOPS_RATIO[volumeType.value];
    if (maxRatio !== undefined && iops > volumeSize.value * maxRatio) {
      report(
        `IOPS to volume size ratio of ${iops / volumeSize.value} is too high; maximum is ${maxRatio}.`,
        'ERROR',
        [volumeIops],
      );
    }
  }
}

interface SnapshotParams {
  snapshotId: Param<string | undefined>;
  volumeSize: Param<number | undefined>;
}

/**
 * Checks a volume restored from a snapshot: the snapshot must exist, be completed,
 * and the volume must not be smaller than it.
 */
export class EbsVolumeSizeSnapshotValidator extends Validator<SnapshotParams> {
  readonly name = 'EbsVolumeSizeSnapshotValidator';

  constructor(
    private readonly snapshots: SnapshotLookup,
    private readonly partition: string = 'aws',
  ) {
    super();
  }

  protected async check({ snapshotId, volumeSize }: SnapshotParams, report: FailureReporter): Promise<void> {
    const id = snapshotId.value;
    if (!id) return;

    const result = await this.snapshots.getSnapshotInfo(id);
    if (result.kind === 'not-found') {
      report(`The snapshot ${id} does not appear to exist: ${result.message}`, 'ERROR', [snapshotId]);
      return;
    }
    if (result.kind === 'error') {
      report(`Issue getting info for snapshot ${id}: ${result.message}`, 'ERROR', [snapshotId]);
      return;
    }

    const snapshot = result.value;
    if (snapshot.volumeSize === undefined) {
      report(`Unable to get volume size for snapshot ${id}`, 'ERROR', [snapshotId]);
    } else if (volumeSize.value !== undefined && volumeSize.value < snapshot.volumeSize) {
      report(
        `The EBS volume size must not be smaller than ${snapshot.volumeSize}, because it is the size of the provided snapshot ${id}`,
        'ERROR',
        [volumeSize],
      );
    } else if (volumeSize.value !== undefined && volumeSize.value > snapshot.volumeSize) {
      const docsHost = this.partition === 'aws-cn' ? 'docs.amazonaws.cn' : 'docs.aws.amazon.com';
      report(
        'The specified volume size is larger than snapshot size. In order to use the full capacity ' +
          "of the volume, you'll need to manually resize the partition according to this doc: " +
          `https://${docsHost}/AWSEC2/latest/UserGuide/recognize-expanded-volume-linux.html`,
        'WARNING',
        [volumeSize],
      );
    }

    if (snapshot.state !== 'completed') {
      report(`Snapshot ${id} is in state '${snapshot.state ?? 'unknown'}' not 'completed'`, 'WARNING', [snapshotId]);
    }
  }
}

interface KmsKeyIdParams {
  volumeKmsKeyId: Param<string | undefined>;
  volumeEncrypted: Param<boolean | undefined>;
}

export class EbsVolumeKmsKeyIdValidator extends Validator<KmsKeyIdParams> {
  readonly name = 'EbsVolumeKmsKeyIdValidator';

  protected check({ volumeKmsKeyId, volumeEncrypted }: KmsKeyIdParams, report: FailureReporter): void {
    if (volumeKmsKeyId.value && !volumeEncrypted.value) {
      report(
        `Kms Key Id ${volumeKmsKeyId.value} is specified, the encrypted state must be True.`,
        'ERROR',
        [volumeEncrypted],
      );
    }
  }
}
