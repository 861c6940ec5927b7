import { Test, TestingModule } from '@nestjs/testing';
import { StorageService } from './storage.service';
import {
  IStorageProvider,
  STORAGE_PROVIDER,
} from '../../interfaces/storage.interface';
import { FileOperationException } from '../../exceptions/file-operation.exception';

describe('StorageService', () => {
  let service: StorageService;
  let provider: jest.Mocked<IStorageProvider>;

  beforeEach(async () => {
    provider = {
      storeFile: jest.fn(),
      storeBuffer: jest.fn(),
      fetchUrl: jest.fn(),
      read: jest.fn(),
      getSize: jest.fn(),
      getNativeUri: jest.fn(),
      deleteFile: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        StorageService,
        { provide: STORAGE_PROVIDER, useValue: provider },
      ],
    }).compile();

    service = module.get<StorageService>(StorageService);
  });

  it('should delegate to the configured provider', async () => {
    provider.storeBuffer.mockResolvedValue('uploads/a.mp3');
    provider.getNativeUri.mockReturnValue('gs://bucket/uploads/a.mp3');

    await expect(
      service.storeBuffer(Buffer.from('a'), 'uploads/a.mp3'),
    ).resolves.toBe('uploads/a.mp3');
    expect(service.getNativeUri('uploads/a.mp3')).toBe(
      'gs://bucket/uploads/a.mp3',
    );
  });

  it('should wrap provider failures in a FileOperationException', async () => {
    provider.getSize.mockRejectedValue(new Error('No such object'));

    const error: unknown = await service
      .getSize('missing.mp3')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FileOperationException);
    expect(error).toMatchObject({
      operation: 'stat',
      ref: 'missing.mp3',
      message: 'Storage stat failed: No such object',
    });
  });
});
