import { Module, Global } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { UPLOAD_CONFIG, buildUploadConfig } from '../config/configuration';
import { FileStorageService } from './file-storage.service';

@Global()
@Module({
  providers: [
    {
      provide: UPLOAD_CONFIG,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        buildUploadConfig(configService),
    },
    FileStorageService,
  ],
  exports: [UPLOAD_CONFIG, FileStorageService],
})
export class StorageModule {}
