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
vi.mock('../../src/cli/utils/context.js', () => ({
  buildCommandContext: buildCommandContextMock,
}));

const listImageBuilderStacksMock = vi.hoisted(() => vi.fn());
const listClusterStacksMock = vi.hoisted(() => vi.fn());
vi.mock('../../src/cli/utils/cfn.js', async () => {
  const actual = await vi.importActual<typeof import('../../src/cli/utils/cfn.js')>(
    '../../src/cli/utils/cfn.js',
  );
  return {
    ...actual,
    listImageBuilderStacks: listImageBuilderStacksMock,
    listClusterStacks: listClusterStacksMock,
  };
});

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

import { handleError } from '../../src/cli/utils/errors.js';
import { logger } from '../../src/cli/utils/logger.js';
import listImagesCommand, { toImageStackSummary } from '../../src/cli/commands/list-images.js';
import listStacksCommand from '../../src/cli/commands/list-stacks.js';
import { makeCommandContext } from '../helpers/fixtures/command-context.js';

const handleErrorMock = vi.mocked(handleError);
const baseArgs = { _: [], $0: 'hpc-image-builder' };

async function runListImages(): Promise<void> {
  const handler = listImagesCommand.handler;
  if (!handler) throw new Error('list-images command has no handler');
  await handler({ ...baseArgs });
}

async function runListStacks(): Promise<void> {
  const handler = listStacksCommand.handler;
  if (!handler) throw new Error('list-stacks command has no handler');
  await handler({ ...baseArgs });
}

describe('list commands', () => {
  const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

  beforeEach(() => {
    buildCommandContextMock.mockResolvedValue(makeCommandContext({ region: 'eu-west-1' }));
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it('lists image stacks by image id', async () => {
    listImageBuilderStacksMock.mockResolvedValueOnce([
      { StackName: 'hpcimg-base', StackStatus: 'CREATE_COMPLETE', Tags: [{ Key: 'hpcimg:image_name', Value: 'base' }] },
    ]);

    await runListImages();

    expect(listImageBuilderStacksMock).toHaveBeenCalledWith('eu-west-1');
    expect(spinner.succeed).toHaveBeenCalledWith('Found 1 image(s)');
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('hpcimg-base'));
    expect(handleErrorMock).not.toHaveBeenCalled();
  });

  it('says so when there are no images', async () => {
    listImageBuilderStacksMock.mockResolvedValueOnce([]);

    await runListImages();

    expect(logger.info).toHaveBeenCalledWith('No images found in eu-west-1');
  });

  it('hands listing failures to the error handler', async () => {
    listImageBuilderStacksMock.mockRejectedValue(new Error('Failed to list stacks: denied'));

    await runListImages();

    expect(spinner.fail).toHaveBeenCalledWith('Failed to list images');
    expect(handleErrorMock).toHaveBeenCalledWith(expect.objectContaining({ message: 'Failed to list stacks: denied' }));
  });

  it('lists prefixed stacks', async () => {
    listClusterStacksMock.mockResolvedValueOnce([{ StackName: 'hpcimg-base', StackStatus: 'CREATE_IN_PROGRESS' }]);

    await runListStacks();

    expect(listClusterStacksMock).toHaveBeenCalledWith('eu-west-1');
    expect(logger.title).toHaveBeenCalledWith('Image Configuration - Stacks');
  });
});

describe('toImageStackSummary', () => {
  it('maps a stack to a summary', () => {
    const createdAt = new Date('2024-03-01T10:00:00.000Z');
    expect(
      toImageStackSummary(
        {
          StackName: 'hpcimg-base',
          StackStatus: 'CREATE_COMPLETE',
          CreationTime: createdAt,
          Tags: [{ Key: 'hpcimg:image_name', Value: 'base' }],
        },
        'eu-west-1',
      ),
    ).toEqual({
      imageId: 'base',
      stackName: 'hpcimg-base',
      stackStatus: 'CREATE_COMPLETE',
      region: 'eu-west-1',
      createdAt: '2024-03-01T10:00:00.000Z',
    });
  });
});
