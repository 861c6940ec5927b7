import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { StorageType } from '../../enums/storage-type.enum';
import {
  IStorageProvider,
  STORAGE_PROVIDER,
  StorageConfig,
} from '../../interfaces/storage.interface';
import { LocalStorageProvider } from './local-storage.provider';
import { CloudStorageProvider } from './cloud-storage.provider';
import { StorageService } from './storage.service';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: STORAGE_PROVIDER,
      useFactory: (configService: ConfigService): IStorageProvider => {
        const storageType = configService.get<string>('STORAGE_TYPE', 'local');

        switch (storageType) {
          case StorageType.CLOUD:
            return new CloudStorageProvider(
              buildConfig(configService, StorageType.CLOUD),
            );
          case StorageType.LOCAL:
          default:
            return new LocalStorageProvider(
              buildConfig(configService, StorageType.LOCAL),
            );
        }
      },
      inject: [ConfigService],
    },
    StorageService,
  ],
  exports: [StorageService],
})
export class StorageModule {}

function buildConfig(
  configService: ConfigService,
  type: StorageType,
): StorageConfig {
  return {
    type,
    path: configService.get<string>('UPLOAD_PATH', './uploads'),
    bucket: configService.get<string>('STORAGE_BUCKET'),
  };
}
