import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { getToken } from '@willsoto/nestjs-prometheus';
import {
  LeadDocumentService,
  documentFilename,
  documentPath,
} from './lead-document.service';
import { PDF_RENDERER } from './interfaces/pdf-renderer.interface';
import { FILE_STORAGE } from './interfaces/file-storage.interface';
import { Lead } from '../leads/lead.entity';
import { LeadActivity } from '../leads/lead-activity.entity';
import { Product } from '../products/product.entity';
import { SubCategory } from '../products/sub-category.entity';
import { CircuitBreakerFactory } from '../common/circuit-breaker.factory';
import {
  LEAD_DOCUMENTS_TOTAL,
  LEAD_DOCUMENT_DURATION,
} from '../common/metrics.providers';

describe('LeadDocumentService', () => {
  let service: LeadDocumentService;
  let breakerFactory: CircuitBreakerFactory;

  const mockLeadRepository = { update: jest.fn() };
  const mockActivityRepository = { create: jest.fn(), save: jest.fn() };
  const mockRenderer = { render: jest.fn() };
  const mockStorage = {
    save: jest.fn(),
    url: jest.fn(),
    delete: jest.fn(),
  };
  const mockCounter = { inc: jest.fn() };
  const endTimer = jest.fn();
  const mockHistogram = { startTimer: jest.fn(() => endTimer) };

  const buildLead = (): Lead =>
    Object.assign(new Lead(), {
      id: 42,
      referenceNumber: 'LI-2025-7',
      status: 'submitted',
      source: 'mobile_app',
      customerName: 'Asha Rao',
      customerEmail: 'asha@example.com',
      customerPhone: '9999999999',
      formData: { nominee_name: 'Ravi' },
      createdAt: new Date('2025-03-01T10:00:00Z'),
      pdfPath: null,
      pdfUrl: null,
      product: Object.assign(new Product(), {
        name: 'Term Life Protection Plus Plan',
        subCategory: Object.assign(new SubCategory(), {
          name: 'Life Insurance',
        }),
      }),
      agent: null,
    });

  beforeEach(async () => {
    jest.clearAllMocks();

    mockActivityRepository.create.mockImplementation(
      (fields: Partial<LeadActivity>) =>
        Object.assign(new LeadActivity(), fields),
    );
    mockStorage.save.mockImplementation(async (name: string) => name);
    mockStorage.url.mockImplementation((name: string) => `/media/${name}`);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LeadDocumentService,
        CircuitBreakerFactory,
        { provide: getRepositoryToken(Lead), useValue: mockLeadRepository },
        {
          provide: getRepositoryToken(LeadActivity),
          useValue: mockActivityRepository,
        },
        { provide: PDF_RENDERER, useValue: mockRenderer },
        { provide: FILE_STORAGE, useValue: mockStorage },
        { provide: getToken(LEAD_DOCUMENTS_TOTAL), useValue: mockCounter },
        { provide: getToken(LEAD_DOCUMENT_DURATION), useValue: mockHistogram },
        {
          provide: ConfigService,
          useValue: new ConfigService({ PDF_TIMEOUT_MS: 200 }),
        },
      ],
    }).compile();

    service = module.get<LeadDocumentService>(LeadDocumentService);
    breakerFactory = module.get<CircuitBreakerFactory>(CircuitBreakerFactory);
  });

  afterEach(() => {
    breakerFactory.onModuleDestroy();
  });

  it('should store the PDF and record the document on the lead', async () => {
    mockRenderer.render.mockResolvedValue(Buffer.from('%PDF-1.7'));
    const lead = buildLead();

    const stored = await service.generate(lead, 5);

    expect(stored).toBe(true);
    const [name, , contentType] = mockStorage.save.mock.calls[0];
    expect(name).toMatch(
      /^lead_pdfs\/\d{4}\/\d{2}\/LI-2025-7_Term_Life_Protection_20250301\.pdf$/,
    );
    expect(contentType).toBe('application/pdf');
    expect(lead.pdfPath).toBe(name);
    expect(lead.pdfUrl).toBe(`/media/${name}`);
    expect(mockLeadRepository.update).toHaveBeenCalledWith(42, {
      pdfPath: name,
      pdfUrl: `/media/${name}`,
    });
    expect(mockActivityRepository.create).toHaveBeenCalledWith(
      expect.objectContaining({
        leadId: 42,
        userId: 5,
        activityType: 'document_uploaded',
      }),
    );
    expect(mockCounter.inc).toHaveBeenCalledWith({ status: 'success' });
    expect(endTimer).toHaveBeenCalled();
  });

  it('should pass customer, product and form data to the renderer', async () => {
    mockRenderer.render.mockResolvedValue(Buffer.from('%PDF-1.7'));

    await service.generate(buildLead());

    expect(mockRenderer.render).toHaveBeenCalledWith(
      expect.objectContaining({
        referenceNumber: 'LI-2025-7',
        customer: {
          name: 'Asha Rao',
          email: 'asha@example.com',
          phone: '9999999999',
        },
        product: {
          name: 'Term Life Protection Plus Plan',
          subCategory: 'Life Insurance',
        },
        agent: null,
        formData: { nominee_name: 'Ravi' },
      }),
    );
  });

  it('should swallow renderer failures and leave the lead untouched', async () => {
    mockRenderer.render.mockRejectedValue(new Error('font missing'));
    const lead = buildLead();

    const stored = await service.generate(lead);

    expect(stored).toBe(false);
    expect(lead.pdfUrl).toBeNull();
    expect(mockStorage.save).not.toHaveBeenCalled();
    expect(mockLeadRepository.update).not.toHaveBeenCalled();
    expect(mockActivityRepository.save).not.toHaveBeenCalled();
    expect(mockCounter.inc).toHaveBeenCalledWith({ status: 'failure' });
  });

  it('should swallow storage failures', async () => {
    mockRenderer.render.mockResolvedValue(Buffer.from('%PDF-1.7'));
    mockStorage.save.mockRejectedValue(new Error('disk full'));

    await expect(service.generate(buildLead())).resolves.toBe(false);
  });

  it('should give up when rendering exceeds the timeout', async () => {
    mockRenderer.render.mockImplementation(
      () =>
        new Promise<Buffer>((resolve) =>
          setTimeout(() => resolve(Buffer.from('late')), 1_000),
        ),
    );

    await expect(service.generate(buildLead())).resolves.toBe(false);
    expect(mockLeadRepository.update).not.toHaveBeenCalled();
  });

  describe('discard', () => {
    it('should delete the stored PDF', async () => {
      const lead = Object.assign(buildLead(), {
        pdfPath: 'lead_pdfs/2025/03/LI-2025-7.pdf',
      });

      await service.discard(lead);

      expect(mockStorage.delete).toHaveBeenCalledWith(
        'lead_pdfs/2025/03/LI-2025-7.pdf',
      );
    });

    it('should skip leads without a document', async () => {
      await service.discard(buildLead());

      expect(mockStorage.delete).not.toHaveBeenCalled();
    });

    it('should not raise when the storage refuses', async () => {
      mockStorage.delete.mockRejectedValueOnce(new Error('access denied'));
      const lead = Object.assign(buildLead(), { pdfPath: 'lead_pdfs/x.pdf' });

      await expect(service.discard(lead)).resolves.toBeUndefined();
    });
  });
});

describe('document naming', () => {
  it('should build the filename from reference, product and creation date', () => {
    const lead = Object.assign(new Lead(), {
      referenceNumber: 'HI-2024-12',
      createdAt: new Date('2024-11-05T23:30:00Z'),
      product: Object.assign(new Product(), { name: 'Family Floater' }),
    });

    expect(documentFilename(lead)).toBe('HI-2024-12_Family_Floater_20241105.pdf');
  });

  it('should file documents by upload year and month', () => {
    expect(
      documentPath('x.pdf', new Date('2025-01-31T12:00:00Z')),
    ).toBe('lead_pdfs/2025/01/x.pdf');
  });
});
