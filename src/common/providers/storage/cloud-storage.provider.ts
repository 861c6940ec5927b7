import { Storage } from '@google-cloud/storage';
import {
  IStorageProvider,
  StorageConfig,
} from '../../interfaces/storage.interface';

const SIGNED_URL_TTL_MS = 60 * 60 * 1000;

export class CloudStorageProvider implements IStorageProvider {
  private readonly bucketName: string;

  constructor(
    config: StorageConfig,
    private readonly storage: Storage = new Storage(),
  ) {
    if (!config.bucket) {
      throw new Error('Bucket name is required for cloud storage');
    }
    this.bucketName = config.bucket;
  }

  async storeFile(localPath: string, key: string): Promise<string> {
    await this.bucket().upload(localPath, { destination: key });
    return key;
  }

  async storeBuffer(buffer: Buffer, key: string): Promise<string> {
    await this.bucket().file(key).save(buffer);
    return key;
  }

  async fetchUrl(ref: string): Promise<string> {
    const [url] = await this.bucket()
      .file(ref)
      .getSignedUrl({
        action: 'read',
        expires: Date.now() + SIGNED_URL_TTL_MS,
      });
    return url;
  }

  async read(ref: string): Promise<Buffer> {
    const [contents] = await this.bucket().file(ref).download();
    return contents;
  }

  async getSize(ref: string): Promise<number> {
    const [metadata] = await this.bucket().file(ref).getMetadata();
    const size = Number(metadata.size);
    if (!Number.isFinite(size)) {
      throw new Error(`Object ${ref} has no size metadata`);
    }
    return size;
  }

  getNativeUri(ref: string): string {
    return `gs://${this.bucketName}/${ref}`;
  }

  async deleteFile(ref: string): Promise<void> {
    await this.bucket().file(ref).delete({ ignoreNotFound: true });
  }

  private bucket() {
    return this.storage.bucket(this.bucketName);
  }
}
