// Prefix of every stack this tool creates
export const STACK_PREFIX = 'hpcimg-';

// Tag carrying the image id on image-build stacks
export const IMAGE_NAME_TAG = 'hpcimg:image_name';

// Tag keys starting with this are set by the tool and cannot be user-defined
export const RESERVED_TAG_PREFIX = 'hpcimg_';

// Logical id of the image resource inside the build stack
export const IMAGE_RESOURCE_LOGICAL_ID = 'BuildImage';

export const DEFAULT_REGION = 'us-east-1';

export const DEFAULT_CONFIG_FILE = 'image-config.yaml';

// Minimum supported Node.js major version
export const MIN_NODE_VERSION = 20;
