import { StorageType } from '../enums/storage-type.enum';

export interface StorageConfig {
  type: StorageType;
  path: string;
  bucket?: string;
}

/**
 * Blob store for source uploads and transcoded segments. A ref is opaque to
 * callers: a file path for local storage, an object key in a bucket for
 * cloud storage.
 */
export interface IStorageProvider {
  storeFile(localPath: string, key: string): Promise<string>;

  storeBuffer(buffer: Buffer, key: string): Promise<string>;

  /** Locator ffmpeg can read from: a path or a short-lived signed URL. */
  fetchUrl(ref: string): Promise<string>;

  read(ref: string): Promise<Buffer>;

  getSize(ref: string): Promise<number>;

  /** URI a cloud service can read directly, or null when there is none. */
  getNativeUri(ref: string): string | null;

  deleteFile(ref: string): Promise<void>;
}

export const STORAGE_PROVIDER = 'STORAGE_PROVIDER';
