import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter, Histogram } from 'prom-client';
import { Repository } from 'typeorm';
import CircuitBreaker from 'opossum';
import { Lead } from '../leads/lead.entity';
import { LeadActivity } from '../leads/lead-activity.entity';
import { CircuitBreakerFactory } from '../common/circuit-breaker.factory';
import {
  LEAD_DOCUMENTS_TOTAL,
  LEAD_DOCUMENT_DURATION,
} from '../common/metrics.providers';
import {
  LeadDocumentData,
  PDF_RENDERER,
  PdfRenderer,
} from './interfaces/pdf-renderer.interface';
import {
  FILE_STORAGE,
  FileStorage,
} from './interfaces/file-storage.interface';

export const LEAD_DOCUMENT_BREAKER = 'lead-documents';
const PDF_CONTENT_TYPE = 'application/pdf';

export interface StoredDocument {
  path: string;
  url: string;
}

/** `LI-2025-1_Term_Life_Plan_20250301.pdf` */
export function documentFilename(lead: Lead): string {
  const productPart = lead.product.name.replace(/ /g, '_').slice(0, 20);
  const datePart = lead.createdAt.toISOString().slice(0, 10).replace(/-/g, '');
  return `${lead.referenceNumber}_${productPart}_${datePart}.pdf`;
}

/** `lead_pdfs/YYYY/MM/<filename>`, dated by upload time. */
export function documentPath(filename: string, uploadedAt: Date): string {
  const year = uploadedAt.getUTCFullYear();
  const month = String(uploadedAt.getUTCMonth() + 1).padStart(2, '0');
  return `lead_pdfs/${year}/${month}/${filename}`;
}

/**
 * Renders a lead to PDF and stores it. Best-effort: callers get `false`
 * back on any failure (render error, storage error, timeout, open circuit)
 * and the lead stays as it was.
 */
@Injectable()
export class LeadDocumentService {
  private readonly logger = new Logger(LeadDocumentService.name);
  private readonly breaker: CircuitBreaker<[Lead], StoredDocument>;

  constructor(
    @InjectRepository(Lead)
    private readonly leadRepository: Repository<Lead>,
    @InjectRepository(LeadActivity)
    private readonly activityRepository: Repository<LeadActivity>,
    @Inject(PDF_RENDERER)
    private readonly renderer: PdfRenderer,
    @Inject(FILE_STORAGE)
    private readonly storage: FileStorage,
    @InjectMetric(LEAD_DOCUMENTS_TOTAL)
    private readonly documentsCounter: Counter<string>,
    @InjectMetric(LEAD_DOCUMENT_DURATION)
    private readonly durationHistogram: Histogram<string>,
    breakerFactory: CircuitBreakerFactory,
    configService: ConfigService,
  ) {
    this.breaker = breakerFactory.createBreaker(
      LEAD_DOCUMENT_BREAKER,
      (lead: Lead) => this.renderAndStore(lead),
      { timeout: configService.get<number>('PDF_TIMEOUT_MS', 30_000) },
    );
  }

  /**
   * Expects `product.subCategory` and `agent.user` loaded. On success the
   * lead's pdfPath/pdfUrl are set in place and persisted.
   */
  async generate(lead: Lead, actorId: number | null = null): Promise<boolean> {
    const endTimer = this.durationHistogram.startTimer();
    try {
      const stored = await this.breaker.fire(lead);

      await this.leadRepository.update(lead.id, {
        pdfPath: stored.path,
        pdfUrl: stored.url,
      });
      lead.pdfPath = stored.path;
      lead.pdfUrl = stored.url;

      await this.activityRepository.save(
        this.activityRepository.create({
          leadId: lead.id,
          userId: actorId,
          activityType: 'document_uploaded',
          description: 'Application PDF generated',
          metadata: { path: stored.path },
        }),
      );

      this.documentsCounter.inc({ status: 'success' });
      this.logger.log(`Stored PDF for lead ${lead.referenceNumber}`);
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.documentsCounter.inc({ status: 'failure' });
      this.logger.error(
        `PDF generation failed for lead ${lead.referenceNumber}: ${message}`,
      );
      return false;
    } finally {
      endTimer();
    }
  }

  /** Removes the stored PDF, if any. Failures are logged, not raised. */
  async discard(lead: Lead): Promise<void> {
    if (!lead.pdfPath) {
      return;
    }
    try {
      await this.storage.delete(lead.pdfPath);
      this.logger.log(`Removed PDF of lead ${lead.referenceNumber}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(
        `Could not remove PDF ${lead.pdfPath} of lead ${lead.referenceNumber}: ${message}`,
      );
    }
  }

  private async renderAndStore(lead: Lead): Promise<StoredDocument> {
    const bytes = await this.renderer.render(this.documentData(lead));
    const name = documentPath(documentFilename(lead), new Date());
    const path = await this.storage.save(name, bytes, PDF_CONTENT_TYPE);
    return { path, url: this.storage.url(path) };
  }

  private documentData(lead: Lead): LeadDocumentData {
    return {
      referenceNumber: lead.referenceNumber,
      status: lead.status,
      source: lead.source,
      createdAt: lead.createdAt,
      customer: {
        name: lead.customerName,
        email: lead.customerEmail,
        phone: lead.customerPhone,
      },
      product: {
        name: lead.product.name,
        subCategory: lead.product.subCategory?.name ?? '',
      },
      agent: lead.agent
        ? {
            code: lead.agent.agentCode,
            name: lead.agent.user?.fullName ?? '',
          }
        : null,
      formData: lead.formData,
      generatedAt: new Date(),
    };
  }
}
