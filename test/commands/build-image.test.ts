import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';

const spinner = vi.hoisted(() => ({
  start: vi.fn().mockReturnThis(),
  succeed: vi.fn().mockReturnThis(),
  fail: vi.fn().mockReturnThis(),
  warn: vi.fn().mockReturnThis(),
  text: '',
}));

vi.mock('ora', () => ({
  default: vi.fn(() => spinner),
}));

const buildCommandContextMock = vi.hoisted(() => vi.fn());
const createValidationCollaboratorsMock = vi.hoisted(() => vi.fn());
vi.mock('../../src/cli/utils/context.js', () => ({
  buildCommandContext: buildCommandContextMock,
  createValidationCollaborators: createValidationCollaboratorsMock,
}));

const loadImageBuilderConfigMock = vi.hoisted(() => vi.fn());
vi.mock('../../src/cli/utils/config.js', async () => {
  const actual = await vi.importActual<typeof import('../../src/cli/utils/config.js')>(
    '../../src/cli/utils/config.js',
  );
  return {
    ...actual,
    loadImageBuilderConfig: loadImageBuilderConfigMock,
  };
});

const stackExistsMock = vi.hoisted(() => vi.fn());
const createStackFromUrlMock = vi.hoisted(() => vi.fn());
vi.mock('../../src/cli/utils/cfn.js', () => ({
  stackExists: stackExistsMock,
  createStackFromUrl: createStackFromUrlMock,
}));

vi.mock('../../src/cli/utils/logger.js', async () => {
  const { createLoggerMock } = await import('../helpers/mocks/logger.js');
  return {
    logger: createLoggerMock(),
  };
});

vi.mock('../../src/cli/utils/errors.js', async () => {
  const actual = await vi.importActual<typeof import('../../src/cli/utils/errors.js')>(
    '../../src/cli/utils/errors.js',
  );
  return {
    ...actual,
    handleError: vi.fn(),
  };
});

import { AWSError, handleError, ValidationError } from '../../src/cli/utils/errors.js';
import { parseImageBuilderConfig } from '../../src/cli/utils/config.js';
import buildImageCommand, { buildStackTags } from '../../src/cli/commands/build-image.js';
import { fakeCollaborators } from '../helpers/fakes/collaborators.js';
import { makeCommandContext } from '../helpers/fixtures/command-context.js';

type BuildImageHandlerArgs = Parameters<NonNullable<(typeof buildImageCommand)['handler']>>[0];
const handleErrorMock = vi.mocked(handleError);

const TEMPLATE_URL = 'https://templates.example.com/imagebuilder.yaml';

async function runBuildImage(args: Partial<BuildImageHandlerArgs> = {}): Promise<void> {
  const handler = buildImageCommand.handler;
  if (!handler) throw new Error('build-image command has no handler');
  await handler({
    imageId: 'base',
    configFile: 'image-config.yaml',
    templateUrl: TEMPLATE_URL,
    rollbackOnFailure: false,
    validationFailureLevel: 'ERROR',
    _: [],
    $0: 'hpc-image-builder',
    ...args,
  });
}

const build = { InstanceType: 'c5.xlarge', ParentImage: 'ami-0123456789abcdef0' };

describe('build-image command', () => {
  vi.spyOn(console, 'log').mockImplementation(() => {});

  beforeEach(() => {
    buildCommandContextMock.mockResolvedValue(makeCommandContext());
    createValidationCollaboratorsMock.mockReturnValue(fakeCollaborators());
    loadImageBuilderConfigMock.mockReturnValue(
      parseImageBuilderConfig({ Image: { Tags: [{ Key: 'team', Value: 'hpc' }] }, Build: build }),
    );
    stackExistsMock.mockResolvedValue(false);
    createStackFromUrlMock.mockResolvedValue('arn:aws:cloudformation:us-east-1:123456789012:stack/hpcimg-base/1');
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it('creates the build stack with image tags and rollback disabled', async () => {
    await runBuildImage();

    expect(buildCommandContextMock).toHaveBeenCalledWith({
      region: undefined,
      profile: undefined,
      requireCredentials: true,
    });
    expect(stackExistsMock).toHaveBeenCalledWith('hpcimg-base', 'us-east-1');
    expect(createStackFromUrlMock).toHaveBeenCalledWith(
      'hpcimg-base',
      TEMPLATE_URL,
      [
        { Key: 'hpcimg:image_name', Value: 'base' },
        { Key: 'team', Value: 'hpc' },
      ],
      'us-east-1',
      true,
    );
    expect(spinner.succeed).toHaveBeenCalledWith('Stack creation started: hpcimg-base');
    expect(handleErrorMock).not.toHaveBeenCalled();
  });

  it('keeps rollback enabled when asked', async () => {
    await runBuildImage({ rollbackOnFailure: true });

    expect(createStackFromUrlMock.mock.calls[0][4]).toBe(false);
  });

  it('requires an https template url', async () => {
    await runBuildImage({ templateUrl: 's3://bucket/template.yaml' });

    expect(buildCommandContextMock).not.toHaveBeenCalled();
    const [error] = handleErrorMock.mock.calls[0];
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ message: 'Template URL must use https: s3://bucket/template.yaml' });
  });

  it('rejects invalid image ids', async () => {
    await runBuildImage({ imageId: '9lives' });

    expect(handleErrorMock).toHaveBeenCalledWith(expect.any(ValidationError));
    expect(createStackFromUrlMock).not.toHaveBeenCalled();
  });

  it('does not create a stack when validation blocks', async () => {
    loadImageBuilderConfigMock.mockReturnValue(
      parseImageBuilderConfig({ Image: { RootVolume: { Size: 10, KmsKeyId: 'test-key' } }, Build: build }),
    );

    await runBuildImage();

    expect(stackExistsMock).not.toHaveBeenCalled();
    expect(createStackFromUrlMock).not.toHaveBeenCalled();
    expect(handleErrorMock).toHaveBeenCalledWith(
      expect.objectContaining({ message: 'Build cancelled: configuration has failures at level ERROR or above' }),
    );
  });

  it('refuses to overwrite an existing image', async () => {
    stackExistsMock.mockResolvedValue(true);

    await runBuildImage();

    expect(createStackFromUrlMock).not.toHaveBeenCalled();
    expect(spinner.fail).toHaveBeenCalledWith('Stack creation failed');
    const [error] = handleErrorMock.mock.calls[0];
    expect(error).toBeInstanceOf(AWSError);
    expect(error).toMatchObject({ message: "Image 'base' already exists (stack hpcimg-base)" });
  });
});

describe('buildStackTags', () => {
  it('puts the image name tag first', () => {
    const config = parseImageBuilderConfig({ Build: build });
    expect(buildStackTags('base', config)).toEqual([{ Key: 'hpcimg:image_name', Value: 'base' }]);
  });
});
