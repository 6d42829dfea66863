import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Lead } from '../leads/lead.entity';
import { LeadActivity } from '../leads/lead-activity.entity';
import { documentMetricsProviders } from '../common/metrics.providers';
import { LeadDocumentService } from './lead-document.service';
import { PDF_RENDERER } from './interfaces/pdf-renderer.interface';
import {
  FILE_STORAGE,
  FileStorage,
} from './interfaces/file-storage.interface';
import { PdfLibRenderer } from './pdf-lib.renderer';
import { LocalFileStorage } from './storage/local-file.storage';
import { S3FileStorage } from './storage/s3-file.storage';

@Module({
  imports: [TypeOrmModule.forFeature([Lead, LeadActivity])],
  providers: [
    LeadDocumentService,
    {
      provide: PDF_RENDERER,
      useClass: PdfLibRenderer,
    },
    {
      provide: FILE_STORAGE,
      useFactory: (configService: ConfigService): FileStorage =>
        configService.get<string>('STORAGE_BACKEND') === 's3'
          ? new S3FileStorage(configService)
          : new LocalFileStorage(configService),
      inject: [ConfigService],
    },
    ...documentMetricsProviders,
  ],
  exports: [LeadDocumentService, FILE_STORAGE],
})
export class DocumentsModule {}
