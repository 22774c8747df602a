import { createReadStream, promises as fs } from "node:fs";
import {
  HeadObjectCommand,
  NotFound,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import type { HeadResult } from "../types.js";

export type ObjectStore = {
  head(key: string): Promise<HeadResult>;
  put(key: string, localPath: string): Promise<void>;
};

export function createS3Client(options: {
  region: string;
  endpoint?: string;
  timeoutMs?: number;
}) {
  return new S3Client({
    region: options.region,
    endpoint: options.endpoint,
    // Local emulators (LocalStack, MinIO) only route path-style requests.
    forcePathStyle: Boolean(options.endpoint),
    requestHandler: {
      connectionTimeout: options.timeoutMs,
      requestTimeout: options.timeoutMs,
    },
  });
}

function isMissingObject(err: unknown) {
  if (err instanceof NotFound) {
    return true;
  }
  if (err instanceof S3ServiceException) {
    return (
      err.name === "NoSuchKey" || err.$metadata.httpStatusCode === 404
    );
  }
  return false;
}

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;
  readonly bucket: string;

  constructor(client: S3Client, bucket: string) {
    this.client = client;
    this.bucket = bucket;
  }

  async head(key: string): Promise<HeadResult> {
    try {
      await this.client.send(
        new HeadObjectCommand({ Bucket: this.bucket, Key: key })
      );
      return "exists";
    } catch (err) {
      if (isMissingObject(err)) {
        return "missing";
      }
      throw err;
    }
  }

  async put(key: string, localPath: string) {
    const { size } = await fs.stat(localPath);
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: createReadStream(localPath),
        ContentLength: size,
      })
    );
  }
}
