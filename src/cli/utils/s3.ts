import { HeadBucketCommand, HeadObjectCommand } from '@aws-sdk/client-s3';
import type { LookupResult } from '../validators/common.js';
import type { ObjectStore } from '../validators/url-validators.js';
import { createS3Client } from './aws-clients.js';

function classifyS3Error(error: unknown): LookupResult<void> {
  if (!(error instanceof Error)) {
    throw error;
  }
  // HEAD responses carry no body, so the SDK reports a bare status name
  if (error.name === 'NotFound' || error.name === 'NoSuchBucket' || error.name === 'NoSuchKey') {
    return { kind: 'not-found', message: error.message };
  }
  return { kind: 'error', message: error.message };
}

export async function headObject(
  bucket: string,
  key: string,
  region: string
): Promise<LookupResult<void>> {
  const client = createS3Client(region);

  try {
    await client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
    return { kind: 'ok', value: undefined };
  } catch (error) {
    return classifyS3Error(error);
  } finally {
    client.destroy();
  }
}

export async function headBucket(bucket: string, region: string): Promise<LookupResult<void>> {
  const client = createS3Client(region);

  try {
    await client.send(new HeadBucketCommand({ Bucket: bucket }));
    return { kind: 'ok', value: undefined };
  } catch (error) {
    return classifyS3Error(error);
  } finally {
    client.destroy();
  }
}

export function createObjectStore(region: string): ObjectStore {
  return {
    headObject: (bucket, key) => headObject(bucket, key, region),
    headBucket: (bucket) => headBucket(bucket, region)
  };
}
