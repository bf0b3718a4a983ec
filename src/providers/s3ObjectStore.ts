import { DeleteObjectCommand, GetObjectCommand, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { DocumentRef } from "../types";
import { CollaboratorError } from "./errors";
import { ObjectStore } from "./types";

export interface S3ObjectStoreOptions {
  region?: string;
  client?: S3Client;
}

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;

  constructor(options: S3ObjectStoreOptions = {}) {
    this.client = options.client ?? new S3Client(options.region ? { region: options.region } : {});
  }

  async getObject(ref: DocumentRef, signal?: AbortSignal): Promise<Buffer> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: ref.container, Key: ref.key }), {
      abortSignal: signal,
    });
    if (!response.Body) {
      throw new CollaboratorError(`Object s3://${ref.container}/${ref.key} has no body`, false);
    }
    return Buffer.from(await response.Body.transformToByteArray());
  }

  async putObject(ref: DocumentRef, body: string, contentType: string, signal?: AbortSignal): Promise<string> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: ref.container,
        Key: ref.key,
        Body: body,
        ContentType: contentType,
      }),
      { abortSignal: signal },
    );
    return `s3://${ref.container}/${ref.key}`;
  }

  async deleteObject(ref: DocumentRef): Promise<void> {
    await this.client.send(new DeleteObjectCommand({ Bucket: ref.container, Key: ref.key }));
  }
}
