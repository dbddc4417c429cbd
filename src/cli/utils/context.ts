import { DEFAULT_REGION } from '../constants.js';
import type { ValidationCollaborators } from '../models/imagebuilder-config.js';
import { applyAwsProfile, validateAWSCredentials, type AWSCredentials } from './aws-validation.js';
import { getPartition } from './aws-clients.js';
import { createSnapshotLookup } from './ec2.js';
import { createUrlFetcher } from './http.js';
import { createObjectStore } from './s3.js';

export interface CommandContext {
  region: string;
  partition: string;
  credentials?: AWSCredentials;
}

export interface CommandContextOptions {
  region?: string;
  profile?: string;
  requireCredentials?: boolean;
}

/**
 * Region precedence: --region, AWS_REGION, AWS_DEFAULT_REGION, then the default.
 */
export function resolveRegion(region?: string): string {
  return region || process.env.AWS_REGION || process.env.AWS_DEFAULT_REGION || DEFAULT_REGION;
}

export async function buildCommandContext(
  options: CommandContextOptions = {}
): Promise<CommandContext> {
  applyAwsProfile(options.profile);
  const region = resolveRegion(options.region);

  const context: CommandContext = {
    region,
    partition: getPartition(region)
  };

  if (options.requireCredentials) {
    context.credentials = await validateAWSCredentials(region);
  }

  return context;
}

export function createValidationCollaborators(ctx: CommandContext): ValidationCollaborators {
  return {
    snapshots: createSnapshotLookup(ctx.region),
    objectStore: createObjectStore(ctx.region),
    fetcher: createUrlFetcher(),
    partition: ctx.partition
  };
}
