/**
 * S3 runbook storage
 */

import {
  S3Client,
  ListObjectsV2Command,
  GetObjectCommand,
} from "@aws-sdk/client-s3";
import type { StoragePort } from "../types";
import { hasErrorName } from "../types";

export interface S3StorageConfig {
  bucket: string;
  region?: string;
  client?: S3Client;
}

export class S3RunbookStorage implements StoragePort {
  private client: S3Client;
  private bucket: string;

  constructor(config: S3StorageConfig) {
    this.bucket = config.bucket;
    this.client = config.client ?? new S3Client({ region: config.region });
  }

  async list(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;

    do {
      const result = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        })
      );

      for (const object of result.Contents || []) {
        if (object.Key && !object.Key.endsWith("/")) {
          keys.push(object.Key);
        }
      }

      continuationToken = result.IsTruncated ? result.NextContinuationToken : undefined;
    } while (continuationToken);

    return keys.sort();
  }

  async read(path: string): Promise<string | null> {
    try {
      const result = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: path })
      );
      if (!result.Body) {
        return null;
      }
      return await result.Body.transformToString("utf-8");
    } catch (error) {
      if (hasErrorName(error, "NoSuchKey", "NotFound")) {
        return null;
      }
      throw error;
    }
  }
}
