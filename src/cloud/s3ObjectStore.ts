import { DeleteObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { AwsCredentialsConfig, ObjectStore } from './types';
import { mapAwsError } from './awsErrors';

export interface S3ObjectStoreOptions extends AwsCredentialsConfig {
  readonly bucket: string;
  /** Host used in object URIs; defaults to s3.{region}.amazonaws.com. */
  readonly publicHost?: string;
}

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;

  constructor(
    private readonly options: S3ObjectStoreOptions,
    client?: S3Client,
  ) {
    this.client =
      client ??
      new S3Client({
        region: options.region,
        credentials: {
          accessKeyId: options.accessKeyId,
          secretAccessKey: options.secretAccessKey,
        },
      });
  }

  public async put(key: string, body: Buffer, contentType: string): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({ Bucket: this.options.bucket, Key: key, Body: body, ContentType: contentType }),
      );
    } catch (error) {
      throw mapAwsError(error, 's3 put_object');
    }
  }

  public async delete(key: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.options.bucket, Key: key }));
    } catch (error) {
      throw mapAwsError(error, 's3 delete_object');
    }
  }

  public uriFor(key: string): string {
    const host = this.options.publicHost ?? `s3.${this.options.region}.amazonaws.com`;
    return `https://${host}/${this.options.bucket}/${encodeURIComponent(key)}`;
  }
}
