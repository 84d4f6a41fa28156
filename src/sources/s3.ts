import {
  S3Client,
  GetObjectCommand,
  PutObjectCommand,
} from "@aws-sdk/client-s3";
import type { ImageStore, ObjectRef, StoredImage } from "./types";
import { StorageError, toError } from "../errors";
import { createLogger } from "../logger";

const log = createLogger("s3-store");

interface ByteStream {
  transformToByteArray(): Promise<Uint8Array>;
}

export interface S3Transport {
  getObject(command: GetObjectCommand): Promise<{ Body?: ByteStream }>;
  putObject(command: PutObjectCommand): Promise<unknown>;
}

export function createS3Transport(region: string): S3Transport {
  const client = new S3Client({ region });
  return {
    getObject: (command) => client.send(command),
    putObject: (command) => client.send(command),
  };
}

export class S3ImageStore implements ImageStore {
  private transport: S3Transport;

  constructor(transport: S3Transport) {
    this.transport = transport;
  }

  async get(ref: ObjectRef): Promise<StoredImage> {
    log.debug({ bucket: ref.bucket, key: ref.key }, "Reading object");
    try {
      const response = await this.transport.getObject(
        new GetObjectCommand({ Bucket: ref.bucket, Key: ref.key })
      );
      if (!response.Body) {
        throw new StorageError(`Object s3://${ref.bucket}/${ref.key} has no body`);
      }
      return { bytes: await response.Body.transformToByteArray() };
    } catch (error) {
      if (error instanceof StorageError) throw error;
      const cause = toError(error);
      throw new StorageError(
        `Unable to read s3://${ref.bucket}/${ref.key}: ${cause.name === "AccessDenied" ? "access denied" : cause.message}`,
        cause
      );
    }
  }

  async put(ref: ObjectRef, bytes: Uint8Array, contentType: string): Promise<void> {
    log.debug({ bucket: ref.bucket, key: ref.key, size: bytes.length }, "Writing object");
    try {
      await this.transport.putObject(
        new PutObjectCommand({ Bucket: ref.bucket, Key: ref.key, Body: bytes, ContentType: contentType })
      );
    } catch (error) {
      const cause = toError(error);
      throw new StorageError(`Unable to write s3://${ref.bucket}/${ref.key}: ${cause.message}`, cause);
    }
  }
}
