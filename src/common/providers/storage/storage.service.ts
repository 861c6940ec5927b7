import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  IStorageProvider,
  STORAGE_PROVIDER,
} from '../../interfaces/storage.interface';
import {
  FileOperation,
  FileOperationException,
} from '../../exceptions/file-operation.exception';
import { getErrorMessage } from '../../utils/error.utils';

@Injectable()
export class StorageService {
  private readonly logger = new Logger(StorageService.name);

  constructor(
    @Inject(STORAGE_PROVIDER)
    private readonly storageProvider: IStorageProvider,
  ) {}

  async storeFile(localPath: string, key: string): Promise<string> {
    return this.wrap('store', key, () =>
      this.storageProvider.storeFile(localPath, key),
    );
  }

  async storeBuffer(buffer: Buffer, key: string): Promise<string> {
    return this.wrap('store', key, () =>
      this.storageProvider.storeBuffer(buffer, key),
    );
  }

  async fetchUrl(ref: string): Promise<string> {
    return this.wrap('read', ref, () => this.storageProvider.fetchUrl(ref));
  }

  async read(ref: string): Promise<Buffer> {
    return this.wrap('read', ref, () => this.storageProvider.read(ref));
  }

  async getSize(ref: string): Promise<number> {
    return this.wrap('stat', ref, () => this.storageProvider.getSize(ref));
  }

  getNativeUri(ref: string): string | null {
    return this.storageProvider.getNativeUri(ref);
  }

  async deleteFile(ref: string): Promise<void> {
    await this.wrap('delete', ref, () => this.storageProvider.deleteFile(ref));
    this.logger.debug(`Deleted ${ref}`);
  }

  private async wrap<T>(
    operation: FileOperation,
    ref: string,
    action: () => Promise<T>,
  ): Promise<T> {
    try {
      return await action();
    } catch (error) {
      const message = getErrorMessage(error);
      this.logger.error(`Storage ${operation} failed for ${ref}: ${message}`);
      throw new FileOperationException(
        `Storage ${operation} failed: ${message}`,
        operation,
        ref,
        error,
      );
    }
  }
}
