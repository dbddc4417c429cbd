export function awsCredentialSuggestions(): string[] {
  return [
    'Session expired? Re-authenticate: aws sso login',
    'First-time setup (IAM Identity Center/SSO): aws configure sso',
    'Using access keys? Configure the AWS CLI: aws configure',
    'Check env vars: AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY',
    'Check credentials file: ~/.aws/credentials',
    'Verify IAM permissions for CloudFormation, EC2, and S3'
  ];
}

export function stackNotFoundSuggestions(): string[] {
  return [
    'Run: hpc-image-builder list-images (to see existing images)',
    'Run: hpc-image-builder build-image (to create the stack)',
    'Confirm --region and --profile point at the right account'
  ];
}

export function configNotFoundSuggestions(): string[] {
  return [
    'Check the path passed to --config-file',
    'Paths are resolved relative to the current directory'
  ];
}

export function configInvalidSuggestions(): string[] {
  return [
    'Fix the fields listed above and run: hpc-image-builder validate --config-file <path>',
    'Keys are case-sensitive (e.g. Build.InstanceType, Image.RootVolume.Size)'
  ];
}

export function validationFailureSuggestions(): string[] {
  return [
    'Fix the failures listed above, or',
    'Skip a check: --suppress-validators type:<ValidatorName>',
    'Only block on more severe failures: --validation-failure-level ERROR'
  ];
}

export function networkSuggestions(): string[] {
  return [
    'Check your internet connection',
    'Verify the AWS region is reachable from your network',
    'Try again in a few moments'
  ];
}
