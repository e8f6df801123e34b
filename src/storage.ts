/**
 * Object storage boundary
 *
 * Source audio and result artifacts are read and written by path. The
 * pipeline only sees ObjectStorage; production uses the Firebase Storage
 * bucket, tests an in-memory map.
 */

import type { Storage } from 'firebase-admin/storage';
import { log } from './logger';
import { PipelineError } from './errors';

export type Bucket = ReturnType<Storage['bucket']>;

export interface ObjectStorage {
  /**
   * @throws PipelineError when nothing is stored at `path`
   */
  get(path: string): Promise<Buffer>;
  put(path: string, data: Buffer | string, contentType?: string): Promise<void>;
}

export class FirebaseObjectStorage implements ObjectStorage {
  constructor(private readonly bucket: Bucket) {}

  async get(path: string): Promise<Buffer> {
    const file = this.bucket.file(path);
    const [exists] = await file.exists();
    if (!exists) {
      throw new PipelineError(`Object not found: ${path}`);
    }

    const [contents] = await file.download();
    log.info('[Storage] Downloaded object', {
      path,
      sizeMb: (contents.length / (1024 * 1024)).toFixed(2)
    });
    return contents;
  }

  async put(path: string, data: Buffer | string, contentType = 'application/octet-stream'): Promise<void> {
    await this.bucket.file(path).save(data, {
      contentType,
      resumable: false
    });
    log.info('[Storage] Wrote object', { path, contentType });
  }
}
