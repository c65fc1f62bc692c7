import {
  S3Client,
  DeleteBucketCommand,
  DeleteObjectsCommand,
  HeadBucketCommand,
  ListObjectVersionsCommand
} from '@aws-sdk/client-s3';
import type { ObjectIdentifier } from '@aws-sdk/client-s3';
import { ApplyError } from '../orchestration/errors';
import { hasErrorName, rethrowAuthErrors } from './aws-errors';
import type { BucketApi } from './types';

// DeleteObjects accepts at most 1000 keys per request.
const DELETE_BATCH = 1000;

export class S3Manager implements BucketApi {
  constructor(private readonly client: () => Pick<S3Client, 'send'>) {}

  async bucketExists(bucketName: string): Promise<boolean> {
    try {
      await this.client().send(new HeadBucketCommand({ Bucket: bucketName }));
      return true;
    } catch (error) {
      if (hasErrorName(error, 'NotFound', 'NoSuchBucket')) {
        return false;
      }
      return rethrowAuthErrors(error);
    }
  }

  /**
   * State buckets are versioned, so every version and delete marker has to go
   * before DeleteBucket succeeds.
   */
  async emptyBucket(bucketName: string): Promise<number> {
    let removed = 0;
    let keyMarker: string | undefined;
    let versionIdMarker: string | undefined;

    do {
      const page = await this.client().send(
        new ListObjectVersionsCommand({ Bucket: bucketName, KeyMarker: keyMarker, VersionIdMarker: versionIdMarker })
      );

      const objects: ObjectIdentifier[] = [];
      for (const entry of [...(page.Versions ?? []), ...(page.DeleteMarkers ?? [])]) {
        if (entry.Key) {
          objects.push({ Key: entry.Key, VersionId: entry.VersionId });
        }
      }

      for (let start = 0; start < objects.length; start += DELETE_BATCH) {
        const batch = objects.slice(start, start + DELETE_BATCH);
        const result = await this.client().send(
          new DeleteObjectsCommand({ Bucket: bucketName, Delete: { Objects: batch, Quiet: true } })
        );
        const failed = result.Errors ?? [];
        if (failed.length > 0) {
          throw new ApplyError(
            `Could not delete ${failed.length} object(s) from ${bucketName}: ${failed[0].Message ?? failed[0].Code ?? 'unknown error'}`
          );
        }
        removed += batch.length;
      }

      keyMarker = page.IsTruncated ? page.NextKeyMarker : undefined;
      versionIdMarker = page.IsTruncated ? page.NextVersionIdMarker : undefined;
    } while (keyMarker);

    return removed;
  }

  async deleteBucket(bucketName: string): Promise<void> {
    try {
      await this.client().send(new DeleteBucketCommand({ Bucket: bucketName }));
    } catch (error) {
      if (hasErrorName(error, 'NoSuchBucket')) {
        return;
      }
      rethrowAuthErrors(error);
    }
  }
}
