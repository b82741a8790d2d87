import { Module } from '@nestjs/common';
import { MulterModule } from '@nestjs/platform-express';
import { CandidateController } from './candidate.controller';
import { CandidateService } from './candidate.service';
import { DatabaseModule } from '../database/database.module';
import { UPLOAD_CONFIG, UploadConfig } from '../config/configuration';

const UPLOAD_LIMIT_HEADROOM = 1024;

@Module({
  imports: [
    DatabaseModule,
    // Some headroom so a file just over the limit still reaches the
    // service and gets the detailed size error
    MulterModule.registerAsync({
      inject: [UPLOAD_CONFIG],
      useFactory: (config: UploadConfig) => ({
        limits: { fileSize: config.maxFileSize + UPLOAD_LIMIT_HEADROOM },
      }),
    }),
  ],
  controllers: [CandidateController],
  providers: [CandidateService],
  exports: [CandidateService],
})
export class CandidateModule {}
