import { describe, it, expect, vi, afterEach } from 'vitest';

const stsSendMock = vi.hoisted(() => vi.fn());
const stsDestroyMock = vi.hoisted(() => vi.fn());

vi.mock('@aws-sdk/client-sts', async () => {
  const { createAwsCommandClass } = await import('../helpers/mocks/aws-commands.js');
  return {
    STSClient: class {
      send = stsSendMock;
      destroy = stsDestroyMock;
    },
    GetCallerIdentityCommand: createAwsCommandClass(),
  };
});

import {
  applyAwsProfile,
  validateAWSCredentials,
  validateNodeVersion,
} from '../../src/cli/utils/aws-validation.js';
import { AWSError, ValidationError } from '../../src/cli/utils/errors.js';

describe('aws-validation utils', () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it('applyAwsProfile sets AWS env vars', () => {
    delete process.env.AWS_PROFILE;
    delete process.env.AWS_SDK_LOAD_CONFIG;
    applyAwsProfile('dev');
    expect(process.env.AWS_PROFILE).toBe('dev');
    expect(process.env.AWS_SDK_LOAD_CONFIG).toBe('1');
    delete process.env.AWS_PROFILE;
    delete process.env.AWS_SDK_LOAD_CONFIG;
  });

  it('applyAwsProfile leaves env alone without a profile', () => {
    delete process.env.AWS_PROFILE;
    applyAwsProfile(undefined);
    expect(process.env.AWS_PROFILE).toBeUndefined();
  });

  it('validateAWSCredentials returns credentials', async () => {
    stsSendMock.mockResolvedValue({
      Account: '123456789012',
      UserId: 'user',
      Arn: 'arn:aws:iam::123456789012:user/test',
    });
    const result = await validateAWSCredentials('us-east-1');
    expect(result).toEqual({
      account: '123456789012',
      userId: 'user',
      arn: 'arn:aws:iam::123456789012:user/test',
    });
    expect(stsDestroyMock).toHaveBeenCalledTimes(1);
  });

  it('validateAWSCredentials throws on missing fields', async () => {
    stsSendMock.mockResolvedValue({ Account: '123' });
    await expect(validateAWSCredentials('us-east-1')).rejects.toThrow('Invalid AWS credentials response');
  });

  it('validateAWSCredentials wraps SDK failures', async () => {
    stsSendMock.mockRejectedValue(new Error('Could not load credentials from any providers'));
    await expect(validateAWSCredentials('us-east-1')).rejects.toMatchObject({
      name: AWSError.name,
      message: 'Failed to validate AWS credentials',
    });
    expect(stsDestroyMock).toHaveBeenCalledTimes(1);
  });

  it('validateNodeVersion throws on old Node', () => {
    const original = process.version;
    Object.defineProperty(process, 'version', { value: 'v18.19.0', configurable: true });
    expect(() => validateNodeVersion()).toThrow(ValidationError);
    Object.defineProperty(process, 'version', { value: 'v20.11.1', configurable: true });
    expect(() => validateNodeVersion()).not.toThrow();
    Object.defineProperty(process, 'version', { value: original, configurable: true });
  });
});
