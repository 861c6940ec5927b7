import { promises as fs } from 'fs';
import { dirname, join, resolve } from 'path';
import {
  IStorageProvider,
  StorageConfig,
} from '../../interfaces/storage.interface';
import { isFileNotFoundError } from '../../utils/error.utils';

export class LocalStorageProvider implements IStorageProvider {
  private readonly root: string;

  constructor(config: StorageConfig) {
    this.root = resolve(config.path);
  }

  async storeFile(localPath: string, key: string): Promise<string> {
    const target = await this.prepareTarget(key);
    await fs.copyFile(localPath, target);
    return target;
  }

  async storeBuffer(buffer: Buffer, key: string): Promise<string> {
    const target = await this.prepareTarget(key);
    await fs.writeFile(target, buffer);
    return target;
  }

  async fetchUrl(ref: string): Promise<string> {
    // For local storage the ref is already a readable path
    return ref;
  }

  async read(ref: string): Promise<Buffer> {
    return fs.readFile(ref);
  }

  async getSize(ref: string): Promise<number> {
    const stats = await fs.stat(ref);
    return stats.size;
  }

  getNativeUri(): string | null {
    return null;
  }

  async deleteFile(ref: string): Promise<void> {
    try {
      await fs.unlink(ref);
    } catch (error) {
      if (!isFileNotFoundError(error)) {
        throw error;
      }
    }
  }

  private async prepareTarget(key: string): Promise<string> {
    const target = join(this.root, key);
    await fs.mkdir(dirname(target), { recursive: true });
    return target;
  }
}
