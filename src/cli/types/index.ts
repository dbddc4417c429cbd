export interface ResourceTag {
  readonly key: string;
  readonly value: string;
}

export interface RootVolume {
  /** GiB. Unset means the size of the parent image's root volume. */
  readonly size?: number;
  readonly encrypted?: boolean;
  readonly kmsKeyId?: string;
  readonly volumeType: string;
  readonly iops?: number;
  /** MB/s */
  readonly throughput?: number;
  readonly snapshotId?: string;
}

export interface ImageSection {
  readonly name?: string;
  readonly tags: readonly ResourceTag[];
  readonly rootVolume?: RootVolume;
}

export type ComponentType = 'arn' | 'script';

export interface BuildComponent {
  readonly type: ComponentType;
  readonly value: string;
}

export interface BuildIam {
  readonly instanceRole?: string;
  readonly cleanupLambdaRole?: string;
}

export interface BuildSection {
  readonly iam?: BuildIam;
  readonly instanceType: string;
  readonly components: readonly BuildComponent[];
  readonly parentImage: string;
  readonly tags: readonly ResourceTag[];
  readonly securityGroupIds: readonly string[];
  readonly subnetId?: string;
}

export interface DistributionConfiguration {
  readonly regions: readonly string[];
  readonly launchPermission?: string;
}

export interface DevSettings {
  readonly updateOsAndReboot: boolean;
  readonly disableBaseComponent: boolean;
  readonly terminateInstanceOnFailure: boolean;
  readonly distributionConfiguration?: DistributionConfiguration;
}

export interface ImageBuilderConfig {
  readonly image?: ImageSection;
  readonly build: BuildSection;
  readonly devSettings?: DevSettings;
  readonly customS3Bucket?: string;
}

export interface ImageStackSummary {
  imageId: string;
  stackName: string;
  stackStatus: string;
  region: string;
  createdAt?: string;
}
