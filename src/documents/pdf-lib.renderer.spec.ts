import { PDFDocument } from 'pdf-lib';
import {
  PdfLibRenderer,
  formatValue,
  humanize,
  toWinAnsi,
} from './pdf-lib.renderer';
import { LeadDocumentData } from './interfaces/pdf-renderer.interface';

describe('PdfLibRenderer', () => {
  const renderer = new PdfLibRenderer();

  const data: LeadDocumentData = {
    referenceNumber: 'LI-2025-1',
    status: 'submitted',
    source: 'mobile_app',
    createdAt: new Date('2025-03-01T10:00:00Z'),
    customer: { name: 'Zoë Müller', email: 'zoe@example.com', phone: '' },
    product: { name: 'Term Life Plan', subCategory: 'Life Insurance' },
    agent: { code: 'AGT1234', name: 'Asha Rao' },
    formData: {
      coverage_amount: 1_000_000,
      nominee_name: 'राहुल',
      riders: ['critical_illness', 'accidental_death'],
    },
    generatedAt: new Date('2025-03-01T10:00:05Z'),
  };

  it('should render a titled A4 document', async () => {
    const bytes = await renderer.render(data);

    expect(bytes.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    const doc = await PDFDocument.load(bytes);
    expect(doc.getTitle()).toBe('Lead LI-2025-1');
    const [width, height] = [doc.getPage(0).getWidth(), doc.getPage(0).getHeight()];
    expect(Math.round(width)).toBe(595);
    expect(Math.round(height)).toBe(842);
  });

  it('should flow long form data onto further pages', async () => {
    const formData: Record<string, string> = {};
    for (let i = 0; i < 80; i++) {
      formData[`answer_${i}`] = `value ${i}`;
    }

    const doc = await PDFDocument.load(
      await renderer.render({ ...data, formData }),
    );

    expect(doc.getPageCount()).toBeGreaterThan(1);
  });
});

describe('toWinAnsi', () => {
  it('should keep Latin-1 and WinAnsi punctuation', () => {
    expect(toWinAnsi('Zoë – “quoted” €5')).toBe('Zoë – “quoted” €5');
  });

  it('should replace characters outside WinAnsi', () => {
    expect(toWinAnsi('राहुल ok')).toBe('????? ok');
  });

  it('should turn control whitespace into spaces', () => {
    expect(toWinAnsi('a\tb\r\nc')).toBe('a b  c');
  });
});

describe('formatting helpers', () => {
  it('should humanize snake_case keys', () => {
    expect(humanize('nominee_relationship')).toBe('Nominee Relationship');
  });

  it('should format scalar, list and empty values', () => {
    expect(formatValue('')).toBe('-');
    expect(formatValue(null)).toBe('-');
    expect(formatValue(42)).toBe('42');
    expect(formatValue(true)).toBe('true');
    expect(formatValue(['a', 1])).toBe('a, 1');
    expect(formatValue({ a: 1 })).toBe('{"a":1}');
  });
});
