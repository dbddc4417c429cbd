import { GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { MIN_NODE_VERSION } from '../constants.js';
import { createStsClient } from './aws-clients.js';
import { ValidationError, AWSError, withRetry } from './errors.js';
import { awsCredentialSuggestions } from './suggestions.js';

export interface AWSCredentials {
  account: string;
  userId: string;
  arn: string;
}

export function applyAwsProfile(profile?: string): void {
  if (!profile) return;
  process.env.AWS_PROFILE = profile;
  process.env.AWS_SDK_LOAD_CONFIG = '1';
}

export async function validateAWSCredentials(region: string): Promise<AWSCredentials> {
  const client = createStsClient(region);

  try {
    const response = await withRetry(
      async () => await client.send(new GetCallerIdentityCommand({})),
      {
        maxAttempts: 3,
        operationName: 'validate AWS credentials'
      }
    );

    if (!response.Account || !response.UserId || !response.Arn) {
      throw new AWSError('Invalid AWS credentials response', [
        'Run: aws configure',
        'Check your AWS credentials are properly set'
      ]);
    }

    return {
      account: response.Account,
      userId: response.UserId,
      arn: response.Arn
    };
  } catch (error) {
    if (error instanceof ValidationError || error instanceof AWSError) {
      throw error;
    }

    throw new AWSError('Failed to validate AWS credentials', awsCredentialSuggestions());
  } finally {
    client.destroy();
  }
}

export function validateNodeVersion(): void {
  const nodeVersion = process.version;
  const majorVersion = parseInt(nodeVersion.split('.')[0].substring(1), 10);

  if (majorVersion < MIN_NODE_VERSION) {
    throw new ValidationError(
      `Node.js version ${nodeVersion} is not supported. Requires Node.js ${MIN_NODE_VERSION} or higher.`,
      [
        `Install Node.js ${MIN_NODE_VERSION} or higher from https://nodejs.org/`,
        'Or use nvm: nvm install 20 && nvm use 20'
      ]
    );
  }
}
