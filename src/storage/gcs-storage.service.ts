import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Storage, Bucket } from '@google-cloud/storage';
import { createHash } from 'node:crypto';
import {
  errorMessage,
  TransientExternalError,
} from '../common/errors/grading.errors';

export interface StoredObject {
  path: string;
  uri: string;
  sizeBytes: number;
  sha256: string;
}

@Injectable()
export class GcsStorageService {
  private readonly bucket: Bucket;
  private readonly logger = new Logger(GcsStorageService.name);

  constructor(private configService: ConfigService) {
    const storage = new Storage({
      projectId: configService.get<string>('storage.gcsProjectId'),
    });
    this.bucket = storage.bucket(
      configService.getOrThrow<string>('storage.gcsBucket'),
    );
  }

  async uploadBuffer(
    buffer: Buffer,
    path: string,
    contentType: string,
  ): Promise<StoredObject> {
    const sha256 = createHash('sha256').update(buffer).digest('hex');

    try {
      await this.bucket.file(path).save(buffer, {
        contentType,
        resumable: false,
        metadata: { metadata: { sha256 } },
      });
    } catch (error) {
      throw new TransientExternalError(
        `Upload of ${path} failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const uri = `gs://${this.bucket.name}/${path}`;
    this.logger.log(`Uploaded: ${uri}`);
    return { path, uri, sizeBytes: buffer.length, sha256 };
  }
}

export function reportObjectPath(jobId: string, at: Date): string {
  const year = at.getUTCFullYear();
  const month = String(at.getUTCMonth() + 1).padStart(2, '0');
  return `reports/${year}/${month}/${jobId}.pdf`;
}
