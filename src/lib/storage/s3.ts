import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import type { StorageConfig } from '../../config/env';
import type { ArtifactRecord, ArtifactSink } from '../jobs/broker';
import type { FetchedArtifact } from '../provider/types';

export function shouldForcePathStyle(endpoint: string): boolean {
  try {
    const url = new URL(endpoint);
    // R2 only signs virtual-hosted requests; MinIO and friends want path-style.
    return !url.hostname.toLowerCase().endsWith('.r2.cloudflarestorage.com');
  } catch {
    return true;
  }
}

export function createS3Client(config: StorageConfig): S3Client {
  return new S3Client({
    region: config.REGION,
    endpoint: config.R2_S3_ENDPOINT,
    forcePathStyle: shouldForcePathStyle(config.R2_S3_ENDPOINT),
    credentials: {
      accessKeyId: config.R2_ACCESS_KEY_ID,
      secretAccessKey: config.R2_SECRET_ACCESS_KEY,
    },
  });
}

export interface StoredArtifact extends ArtifactRecord {
  key: string;
  contentType: string;
  size: number;
  storedAt: string;
}

const EXTENSIONS: Record<string, string> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/webp': 'webp',
  'image/gif': 'gif',
  'audio/mpeg': 'mp3',
  'audio/wav': 'wav',
};

export const paths = {
  artifact: (correlationId: string, contentType: string) =>
    `artifacts/${correlationId}.${EXTENSIONS[contentType.split(';')[0].trim().toLowerCase()] ?? 'bin'}`,
  record: (correlationId: string) => `artifacts/${correlationId}.json`,
};

export interface ArtifactCatalog {
  describe(correlationId: string): Promise<StoredArtifact | null>;
  presignGet(key: string, expiresInSeconds?: number): Promise<string>;
}

/** Artifact bytes plus a JSON sidecar per job, in an S3-compatible bucket. */
export class S3ArtifactStore implements ArtifactSink, ArtifactCatalog {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string
  ) {}

  async persist(record: ArtifactRecord, artifact: FetchedArtifact): Promise<string> {
    const key = paths.artifact(record.correlationId, artifact.contentType);
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: artifact.bytes,
        ContentType: artifact.contentType,
      })
    );

    const stored: StoredArtifact = {
      ...record,
      key,
      contentType: artifact.contentType,
      size: artifact.bytes.byteLength,
      storedAt: new Date().toISOString(),
    };
    await this.putJson(paths.record(record.correlationId), stored);
    return key;
  }

  async describe(correlationId: string): Promise<StoredArtifact | null> {
    return this.getJson<StoredArtifact>(paths.record(correlationId));
  }

  async presignGet(key: string, expiresInSeconds = 60 * 15): Promise<string> {
    return getSignedUrl(this.client, new GetObjectCommand({ Bucket: this.bucket, Key: key }), {
      expiresIn: expiresInSeconds,
    });
  }

  private async putJson(key: string, data: unknown): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: Buffer.from(JSON.stringify(data)),
        ContentType: 'application/json; charset=utf-8',
      })
    );
  }

  private async getJson<T>(key: string): Promise<T | null> {
    try {
      const res = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      const body = await res.Body?.transformToString('utf-8');
      if (!body) return null;
      return JSON.parse(body) as T;
    } catch (error) {
      if (error instanceof Error && error.name === 'NoSuchKey') return null;
      throw error;
    }
  }
}
