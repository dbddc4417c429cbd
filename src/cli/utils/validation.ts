import { STACK_PREFIX } from '../constants.js';
import { isFailureLevel, type FailureLevel } from '../validators/common.js';
import { ValidationError } from './errors.js';

// CloudFormation stack names are limited to 128 characters
const MAX_IMAGE_ID_LENGTH = 128 - STACK_PREFIX.length;

export function validateImageId(imageId: string): string | true {
  if (!imageId || imageId.trim().length === 0) {
    return 'Image id is required';
  }

  if (!/^[a-zA-Z][a-zA-Z0-9-]*$/.test(imageId)) {
    return 'Image id must start with a letter and contain only letters, numbers, and hyphens';
  }

  if (imageId.length > MAX_IMAGE_ID_LENGTH) {
    return `Image id must be ${MAX_IMAGE_ID_LENGTH} characters or less`;
  }

  return true;
}

export function requireImageId(imageId: string): string {
  const result = validateImageId(imageId);
  if (result !== true) {
    throw new ValidationError(`Invalid image id '${imageId}': ${result}`);
  }
  return imageId;
}

export function getImageStackName(imageId: string): string {
  return `${STACK_PREFIX}${imageId}`;
}

export function parseFailureLevel(value: string): FailureLevel {
  const level = value.toUpperCase();
  if (!isFailureLevel(level)) {
    throw new ValidationError(`Invalid validation failure level: ${value}`, [
      'Choose one of: INFO, WARNING, ERROR'
    ]);
  }
  return level;
}
