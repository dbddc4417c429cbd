import { z } from 'zod';
import { RESERVED_TAG_PREFIX } from '../constants.js';
import { EBS_VOLUME_TYPES, GP3_DEFAULT_IOPS, GP3_DEFAULT_THROUGHPUT } from '../validators/ebs-bounds.js';
import { parseUrlScheme } from '../validators/url-validators.js';
import type { ImageBuilderConfig } from '../types/index.js';

const SECURITY_GROUP_ID_PATTERN = /^sg-([0-9a-z]{8}|[0-9a-z]{17})$/;
const SUBNET_ID_PATTERN = /^subnet-([0-9a-z]{8}|[0-9a-z]{17})$/;
const SNAPSHOT_ID_PATTERN = /^snap-([0-9a-z]{8}|[0-9a-z]{17})$/;
const INSTANCE_TYPE_PATTERN = /^[a-z][a-z0-9-]*\.[a-z0-9-]+$/;

function isJson(value: string): boolean {
  try {
    JSON.parse(value);
    return true;
  } catch {
    return false;
  }
}

// ---------------------- Image ---------------------- //

const TagSchema = z
  .object({
    Key: z.string().min(1).max(128),
    Value: z.string().max(256),
  })
  .strict()
  .transform((tag) => ({ key: tag.Key, value: tag.Value }));

const TagListSchema = z.array(TagSchema).superRefine((tags, ctx) => {
  tags.forEach((tag, index) => {
    if (tag.key.startsWith(RESERVED_TAG_PREFIX)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'Key'],
        message: `The tag key prefix '${RESERVED_TAG_PREFIX}' is reserved and cannot be used.`,
      });
    }
  });
});

export const RootVolumeSchema = z
  .object({
    Size: z.number().int().positive().optional(),
    Encrypted: z.boolean().optional(),
    KmsKeyId: z.string().min(1).optional(),
    VolumeType: z.enum(EBS_VOLUME_TYPES).default('gp3'),
    Iops: z.number().int().positive().optional(),
    Throughput: z.number().int().positive().optional(),
    SnapshotId: z.string().regex(SNAPSHOT_ID_PATTERN, 'Invalid snapshot id').optional(),
  })
  .strict()
  .transform((volume) => {
    const isGp3 = volume.VolumeType === 'gp3';
    return {
      size: volume.Size,
      encrypted: volume.Encrypted,
      kmsKeyId: volume.KmsKeyId,
      volumeType: volume.VolumeType,
      iops: volume.Iops ?? (isGp3 ? GP3_DEFAULT_IOPS : undefined),
      throughput: volume.Throughput ?? (isGp3 ? GP3_DEFAULT_THROUGHPUT : undefined),
      snapshotId: volume.SnapshotId,
    };
  });

export const ImageSchema = z
  .object({
    Name: z.string().min(1).optional(),
    Tags: TagListSchema.default([]),
    RootVolume: RootVolumeSchema.optional(),
  })
  .strict()
  .transform((image) => ({
    name: image.Name,
    tags: image.Tags,
    rootVolume: image.RootVolume,
  }));

// ---------------------- Build ---------------------- //

export const ComponentSchema = z
  .object({
    Type: z.enum(['arn', 'script']),
    Value: z.string().min(1),
  })
  .strict()
  .superRefine((component, ctx) => {
    if (component.Type === 'arn' && !component.Value.startsWith('arn')) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['Value'],
        message: `The Type in Component is arn, the value '${component.Value}' is invalid. Choose a value with 'arn' prefix.`,
      });
    }
    if (component.Type === 'script' && !['https', 's3'].includes(parseUrlScheme(component.Value))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['Value'],
        message: `The Type in Component is script, the value '${component.Value}' is invalid. Choose a value with 'https' or 's3' prefix url.`,
      });
    }
  })
  .transform((component) => ({ type: component.Type, value: component.Value }));

const IamSchema = z
  .object({
    InstanceRole: z
      .string()
      .regex(/^arn:.*:(role|instance-profile)\//, 'Must be an IAM role or instance profile ARN')
      .optional(),
    CleanupLambdaRole: z.string().regex(/^arn:.*:role\//, 'Must be an IAM role ARN').optional(),
  })
  .strict()
  .transform((iam) => ({
    instanceRole: iam.InstanceRole,
    cleanupLambdaRole: iam.CleanupLambdaRole,
  }));

export const BuildSchema = z
  .object({
    Iam: IamSchema.optional(),
    InstanceType: z.string().regex(INSTANCE_TYPE_PATTERN, 'Invalid instance type (e.g. c5.xlarge)'),
    Components: z.array(ComponentSchema).default([]),
    ParentImage: z.string().regex(/^(ami|arn)/, "Must be an AMI id or an image ARN"),
    Tags: TagListSchema.default([]),
    SecurityGroupIds: z
      .array(z.string())
      .default([])
      .refine((ids) => ids.every((id) => SECURITY_GROUP_ID_PATTERN.test(id)), {
        message: 'The SecurityGroupIds contains invalid security group id.',
      }),
    SubnetId: z.string().regex(SUBNET_ID_PATTERN, 'Invalid subnet id').optional(),
  })
  .strict()
  .transform((build) => ({
    iam: build.Iam,
    instanceType: build.InstanceType,
    components: build.Components,
    parentImage: build.ParentImage,
    tags: build.Tags,
    securityGroupIds: build.SecurityGroupIds,
    subnetId: build.SubnetId,
  }));

// ---------------------- Dev settings ---------------------- //

const DistributionConfigurationSchema = z
  .object({
    Regions: z.string().optional(),
    LaunchPermission: z
      .string()
      .refine(isJson, (value) => ({ message: `'${value}' is invalid` }))
      .optional(),
  })
  .strict()
  .transform((distribution) => ({
    regions: (distribution.Regions ?? '')
      .split(',')
      .map((region) => region.trim())
      .filter((region) => region.length > 0),
    launchPermission: distribution.LaunchPermission,
  }));

const DevSettingsSchema = z
  .object({
    UpdateOsAndReboot: z.boolean().default(false),
    DisableBaseComponent: z.boolean().default(false),
    TerminateInstanceOnFailure: z.boolean().default(true),
    DistributionConfiguration: DistributionConfigurationSchema.optional(),
  })
  .strict()
  .transform((settings) => ({
    updateOsAndReboot: settings.UpdateOsAndReboot,
    disableBaseComponent: settings.DisableBaseComponent,
    terminateInstanceOnFailure: settings.TerminateInstanceOnFailure,
    distributionConfiguration: settings.DistributionConfiguration,
  }));

// ---------------------- Image builder ---------------------- //

export const ImageBuilderConfigSchema = z
  .object({
    Image: ImageSchema.optional(),
    Build: BuildSchema,
    DevSettings: DevSettingsSchema.optional(),
    CustomS3Bucket: z.string().min(3).max(63).optional(),
  })
  .strict()
  .transform(
    (config): ImageBuilderConfig => ({
      image: config.Image,
      build: config.Build,
      devSettings: config.DevSettings,
      customS3Bucket: config.CustomS3Bucket,
    }),
  );

/**
 * Renders a zod issue path the way keys appear in the file,
 * e.g. `Build.Components[1].Value`.
 */
export function formatIssuePath(path: readonly (string | number)[]): string {
  if (path.length === 0) return '(root)';
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') return `${acc}[${segment}]`;
    return acc ? `${acc}.${segment}` : segment;
  }, '');
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${formatIssuePath(issue.path)}: ${issue.message}`);
}
