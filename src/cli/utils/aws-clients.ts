import { CloudFormationClient } from '@aws-sdk/client-cloudformation';
import { EC2Client } from '@aws-sdk/client-ec2';
import { S3Client } from '@aws-sdk/client-s3';
import { STSClient } from '@aws-sdk/client-sts';

export function createCloudFormationClient(region: string): CloudFormationClient {
  return new CloudFormationClient({ region });
}

export function createEc2Client(region: string): EC2Client {
  return new EC2Client({ region });
}

export function createS3Client(region: string): S3Client {
  return new S3Client({ region });
}

export function createStsClient(region: string): STSClient {
  return new STSClient({ region });
}

export function getPartition(region: string): string {
  if (region.startsWith('cn-')) return 'aws-cn';
  if (region.startsWith('us-gov-')) return 'aws-us-gov';
  return 'aws';
}
