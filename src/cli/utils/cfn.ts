import {
  CreateStackCommand,
  DeleteStackCommand,
  DescribeStackResourceCommand,
  DescribeStacksCommand,
  GetTemplateCommand,
  UpdateStackCommand,
  type Capability,
  type Parameter,
  type Stack,
  type StackResourceDetail,
  type Tag,
} from '@aws-sdk/client-cloudformation';
import { IMAGE_NAME_TAG, STACK_PREFIX } from '../constants.js';
import { createCloudFormationClient } from './aws-clients.js';
import { AWSError, CLIError, StackNotFoundError } from './errors.js';

const DEFAULT_CAPABILITY: Capability = 'CAPABILITY_IAM';

function toAwsError(operation: string, error: unknown): never {
  if (error instanceof CLIError) {
    throw error;
  }
  if (error instanceof Error) {
    throw new AWSError(`Failed to ${operation}: ${error.message}`);
  }
  throw error;
}

function isMissingStackError(error: unknown, stackName: string): boolean {
  return error instanceof Error && error.message.includes(`Stack with id ${stackName} does not exist`);
}

export function getStackTag(stack: Stack, key: string): string | undefined {
  return stack.Tags?.find((tag) => tag.Key === key)?.Value;
}

export async function createStack(
  stackName: string,
  templateBody: string,
  tags: Tag[],
  region: string,
  disableRollback = false,
): Promise<string | undefined> {
  const client = createCloudFormationClient(region);
  try {
    const response = await client.send(
      new CreateStackCommand({
        StackName: stackName,
        TemplateBody: templateBody,
        Capabilities: [DEFAULT_CAPABILITY],
        DisableRollback: disableRollback,
        Tags: tags,
      }),
    );
    return response.StackId;
  } catch (error) {
    return toAwsError('create stack', error);
  } finally {
    client.destroy();
  }
}

export async function createStackFromUrl(
  stackName: string,
  templateUrl: string,
  tags: Tag[],
  region: string,
  disableRollback = false,
  capability: Capability = DEFAULT_CAPABILITY,
): Promise<string | undefined> {
  const client = createCloudFormationClient(region);
  try {
    const response = await client.send(
      new CreateStackCommand({
        StackName: stackName,
        TemplateURL: templateUrl,
        Capabilities: [capability],
        DisableRollback: disableRollback,
        Tags: tags,
      }),
    );
    return response.StackId;
  } catch (error) {
    return toAwsError('create stack', error);
  } finally {
    client.destroy();
  }
}

/**
 * Updates a stack with an in-memory template. The template is pretty-printed
 * so it stays readable in the console.
 */
export async function updateStack(
  stackName: string,
  template: Record<string, unknown>,
  parameters: Parameter[],
  region: string,
): Promise<string | undefined> {
  const client = createCloudFormationClient(region);
  try {
    const response = await client.send(
      new UpdateStackCommand({
        StackName: stackName,
        TemplateBody: JSON.stringify(template, null, 2),
        Parameters: parameters,
        Capabilities: [DEFAULT_CAPABILITY],
      }),
    );
    return response.StackId;
  } catch (error) {
    return toAwsError('update stack', error);
  } finally {
    client.destroy();
  }
}

export async function updateStackFromUrl(
  stackName: string,
  templateUrl: string,
  region: string,
  tags?: Tag[],
): Promise<string | undefined> {
  const client = createCloudFormationClient(region);
  try {
    const response = await client.send(
      new UpdateStackCommand({
        StackName: stackName,
        TemplateURL: templateUrl,
        Capabilities: [DEFAULT_CAPABILITY],
        ...(tags ? { Tags: tags } : {}),
      }),
    );
    return response.StackId;
  } catch (error) {
    return toAwsError('update stack', error);
  } finally {
    client.destroy();
  }
}

export async function deleteStack(stackName: string, region: string): Promise<void> {
  const client = createCloudFormationClient(region);
  try {
    await client.send(new DeleteStackCommand({ StackName: stackName }));
  } catch (error) {
    toAwsError('delete stack', error);
  } finally {
    client.destroy();
  }
}

export async function describeStack(stackName: string, region: string): Promise<Stack> {
  const client = createCloudFormationClient(region);
  try {
    const response = await client.send(new DescribeStacksCommand({ StackName: stackName }));
    const stack = response.Stacks?.[0];
    if (!stack) {
      throw new StackNotFoundError(stackName, 'describe stack');
    }
    return stack;
  } catch (error) {
    if (isMissingStackError(error, stackName)) {
      throw new StackNotFoundError(stackName, 'describe stack');
    }
    return toAwsError('describe stack', error);
  } finally {
    client.destroy();
  }
}

export async function stackExists(stackName: string, region: string): Promise<boolean> {
  try {
    await describeStack(stackName, region);
    return true;
  } catch (error) {
    if (error instanceof StackNotFoundError) {
      return false;
    }
    throw error;
  }
}

export async function getStackTemplate(stackName: string, region: string): Promise<string | undefined> {
  const client = createCloudFormationClient(region);
  try {
    const response = await client.send(new GetTemplateCommand({ StackName: stackName }));
    return response.TemplateBody;
  } catch (error) {
    if (isMissingStackError(error, stackName)) {
      throw new StackNotFoundError(stackName, 'get template');
    }
    return toAwsError('get stack template', error);
  } finally {
    client.destroy();
  }
}

export async function describeStackResource(
  stackName: string,
  logicalResourceId: string,
  region: string,
): Promise<StackResourceDetail | undefined> {
  const client = createCloudFormationClient(region);
  try {
    const response = await client.send(
      new DescribeStackResourceCommand({ StackName: stackName, LogicalResourceId: logicalResourceId }),
    );
    return response.StackResourceDetail;
  } catch (error) {
    if (isMissingStackError(error, stackName)) {
      throw new StackNotFoundError(stackName, 'describe stack resource');
    }
    return toAwsError('describe stack resource', error);
  } finally {
    client.destroy();
  }
}

async function listAllStacks(region: string): Promise<Stack[]> {
  const client = createCloudFormationClient(region);
  const stacks: Stack[] = [];
  let nextToken: string | undefined;

  try {
    do {
      const response = await client.send(new DescribeStacksCommand({ NextToken: nextToken }));
      stacks.push(...(response.Stacks ?? []));
      nextToken = response.NextToken;
    } while (nextToken);
  } catch (error) {
    toAwsError('list stacks', error);
  } finally {
    client.destroy();
  }

  return stacks;
}

/** Top-level stacks whose name carries the tool's prefix. */
export async function listClusterStacks(region: string): Promise<Stack[]> {
  const stacks = await listAllStacks(region);
  return stacks.filter(
    (stack) => stack.ParentId === undefined && (stack.StackName ?? '').startsWith(STACK_PREFIX),
  );
}

/** Top-level stacks tagged with an image name. */
export async function listImageBuilderStacks(region: string): Promise<Stack[]> {
  const stacks = await listAllStacks(region);
  return stacks.filter((stack) => stack.ParentId === undefined && getStackTag(stack, IMAGE_NAME_TAG));
}
