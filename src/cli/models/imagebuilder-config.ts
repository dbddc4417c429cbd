import type { ImageBuilderConfig, RootVolume } from '../types/index.js';
import { param, type ValidationFailure } from '../validators/common.js';
import {
  EbsVolumeIopsValidator,
  EbsVolumeKmsKeyIdValidator,
  EbsVolumeSizeSnapshotValidator,
  EbsVolumeThroughputIopsValidator,
  EbsVolumeThroughputValidator,
  EbsVolumeTypeSizeValidator,
  type SnapshotLookup,
} from '../validators/ebs-validators.js';
import {
  S3BucketValidator,
  UrlValidator,
  type ObjectStore,
  type UrlFetcher,
} from '../validators/url-validators.js';
import { entry, runValidators, type RunOptions, type ValidatorEntry } from '../validators/runner.js';

export interface ValidationCollaborators {
  snapshots: SnapshotLookup;
  objectStore: ObjectStore;
  fetcher: UrlFetcher;
  partition: string;
}

function rootVolumeValidators(
  volume: RootVolume,
  collaborators: ValidationCollaborators,
): ValidatorEntry[] {
  const prefix = 'Image.RootVolume';
  const volumeType = param(`${prefix}.VolumeType`, volume.volumeType);
  const volumeIops = param(`${prefix}.Iops`, volume.iops);
  const volumeThroughput = param(`${prefix}.Throughput`, volume.throughput);
  const entries: ValidatorEntry[] = [];

  if (volume.size !== undefined) {
    const volumeSize = param(`${prefix}.Size`, volume.size);
    entries.push(
      entry(new EbsVolumeTypeSizeValidator(), { volumeType, volumeSize }),
      entry(new EbsVolumeIopsValidator(), { volumeType, volumeSize, volumeIops }),
    );
  }

  entries.push(
    entry(new EbsVolumeThroughputValidator(), { volumeType, volumeThroughput }),
    entry(new EbsVolumeThroughputIopsValidator(), { volumeType, volumeIops, volumeThroughput }),
    entry(new EbsVolumeSizeSnapshotValidator(collaborators.snapshots, collaborators.partition), {
      snapshotId: param(`${prefix}.SnapshotId`, volume.snapshotId),
      volumeSize: param(`${prefix}.Size`, volume.size),
    }),
    entry(new EbsVolumeKmsKeyIdValidator(), {
      volumeKmsKeyId: param(`${prefix}.KmsKeyId`, volume.kmsKeyId),
      volumeEncrypted: param(`${prefix}.Encrypted`, volume.encrypted),
    }),
  );

  return entries;
}

/**
 * Lists every semantic check that applies to `config`, in reporting order.
 */
export function collectValidators(
  config: ImageBuilderConfig,
  collaborators: ValidationCollaborators,
): ValidatorEntry[] {
  const entries: ValidatorEntry[] = [];

  if (config.image?.rootVolume) {
    entries.push(...rootVolumeValidators(config.image.rootVolume, collaborators));
  }

  config.build.components.forEach((component, index) => {
    if (component.type !== 'script') return;
    entries.push(
      entry(new UrlValidator(collaborators.objectStore, collaborators.fetcher), {
        url: param(`Build.Components[${index}].Value`, component.value),
      }),
    );
  });

  if (config.customS3Bucket) {
    entries.push(
      entry(new S3BucketValidator(collaborators.objectStore), {
        bucket: param('CustomS3Bucket', config.customS3Bucket),
      }),
    );
  }

  return entries;
}

export async function validateImageBuilderConfig(
  config: ImageBuilderConfig,
  collaborators: ValidationCollaborators,
  options: RunOptions = {},
): Promise<ValidationFailure[]> {
  return runValidators(collectValidators(config, collaborators), options);
}
