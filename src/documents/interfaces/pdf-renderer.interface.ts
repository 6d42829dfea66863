import type { FormPayload } from '../../leads/lead.entity';

export interface LeadDocumentData {
  referenceNumber: string;
  status: string;
  source: string;
  createdAt: Date;
  customer: {
    name: string;
    email: string;
    phone: string;
  };
  product: {
    name: string;
    subCategory: string;
  };
  agent: {
    code: string;
    name: string;
  } | null;
  formData: FormPayload;
  generatedAt: Date;
}

export interface PdfRenderer {
  render(data: LeadDocumentData): Promise<Buffer>;
}

export const PDF_RENDERER = 'PDF_RENDERER';
