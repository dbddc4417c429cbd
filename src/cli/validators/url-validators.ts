import { Validator, type FailureReporter, type LookupResult, type Param } from './common.js';

export interface ObjectStore {
  headObject(bucket: string, key: string): Promise<LookupResult<void>>;
  headBucket(bucket: string): Promise<LookupResult<void>>;
}

export type FetchResult =
  | { kind: 'ok'; status: number }
  | { kind: 'http-error'; status: number; reason: string }
  | { kind: 'network-error'; reason: string }
  | { kind: 'invalid-url' };

export interface UrlFetcher {
  open(url: string): Promise<FetchResult>;
}

/**
 * Returns the lowercase scheme of `value` without the trailing colon,
 * or an empty string when it has none.
 */
export function parseUrlScheme(value: string): string {
  const match = /^([a-zA-Z][a-zA-Z0-9+.-]*):/.exec(value);
  return match ? match[1].toLowerCase() : '';
}

export function parseS3Uri(value: string): { bucket: string; key: string } | null {
  const match = /^s3:\/\/(.*?)\/(.*)$/.exec(value);
  if (!match) return null;
  return { bucket: match[1], key: match[2] };
}

export class UrlValidator extends Validator<{ url: Param<string> }> {
  readonly name = 'UrlValidator';

  constructor(
    private readonly objectStore: ObjectStore,
    private readonly fetcher: UrlFetcher,
  ) {
    super();
  }

  protected async check({ url }: { url: Param<string> }, report: FailureReporter): Promise<void> {
    const scheme = parseUrlScheme(url.value);

    switch (scheme) {
      case 's3':
        await this.checkS3Uri(url, report);
        return;
      case 'https':
        await this.checkHttpsUrl(url, report);
        return;
      case 'file':
        return;
      default:
        report(
          `The value '${url.value}' is not a valid URL, choose URL with 'https', 's3' or 'file' prefix.`,
          'ERROR',
          [url],
        );
    }
  }

  private async checkS3Uri(url: Param<string>, report: FailureReporter): Promise<void> {
    const location = parseS3Uri(url.value);
    if (!location) {
      report(`s3 url '${url.value}' is invalid.`, 'ERROR', [url]);
      return;
    }

    const result = await this.objectStore.headObject(location.bucket, location.key);
    if (result.kind !== 'ok') {
      report(
        'The S3 object does not exist or you do not have access to it.\n' +
          'Please make sure the build instance has access to it.',
        'ERROR',
        [url],
      );
    }
  }

  private async checkHttpsUrl(url: Param<string>, report: FailureReporter): Promise<void> {
    const result = await this.fetcher.open(url.value);

    switch (result.kind) {
      case 'ok':
        return;
      case 'http-error':
        report(
          `The url '${url.value}' causes HTTPError, the error code is '${result.status}', the error reason is '${result.reason}'`,
          'WARNING',
          [url],
        );
        return;
      case 'network-error':
        report(`The url '${url.value}' causes URLError, the error reason is '${result.reason}'`, 'WARNING', [
          url,
        ]);
        return;
      case 'invalid-url':
        report(`The value '${url.value}' is not a valid URL`, 'ERROR', [url]);
    }
  }
}

export class S3BucketValidator extends Validator<{ bucket: Param<string> }> {
  readonly name = 'S3BucketValidator';

  constructor(private readonly objectStore: ObjectStore) {
    super();
  }

  protected async check({ bucket }: { bucket: Param<string> }, report: FailureReporter): Promise<void> {
    const result = await this.objectStore.headBucket(bucket.value);
    if (result.kind === 'not-found') {
      report(`The S3 bucket '${bucket.value}' does not exist.`, 'ERROR', [bucket]);
    } else if (result.kind === 'error') {
      report(
        `Unable to access the S3 bucket '${bucket.value}': ${result.message}`,
        'ERROR',
        [bucket],
      );
    }
  }
}
