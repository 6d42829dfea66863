import { Injectable } from '@nestjs/common';
import {
  Color,
  PDFDocument,
  PDFFont,
  PDFPage,
  PageSizes,
  StandardFonts,
  rgb,
} from 'pdf-lib';
import {
  LeadDocumentData,
  PdfRenderer,
} from './interfaces/pdf-renderer.interface';

/**
 * Code points outside Latin-1 that WinAnsiEncoding still covers
 * (bytes 0x80-0x9F). Anything else cannot be drawn with a standard font.
 */
const WIN_ANSI_EXTRAS = new Set<number>([
  0x20ac, 0x201a, 0x0192, 0x201e, 0x2026, 0x2020, 0x2021, 0x02c6, 0x2030,
  0x0160, 0x2039, 0x0152, 0x017d, 0x2018, 0x2019, 0x201c, 0x201d, 0x2022,
  0x2013, 0x2014, 0x02dc, 0x2122, 0x0161, 0x203a, 0x0153, 0x017e, 0x0178,
]);

const MARGIN = 56.7; // 2cm
const TITLE_SIZE = 18;
const SECTION_SIZE = 13;
const LABEL_SIZE = 9;
const BODY_SIZE = 11;
const FOOTER_SIZE = 8;
const LINE_HEIGHT = 1.5;

const ACCENT = rgb(0.13, 0.59, 0.95);
const MUTED = rgb(0.4, 0.4, 0.4);
const TEXT = rgb(0.2, 0.2, 0.2);

/** Replaces characters the standard PDF fonts cannot encode with '?'. */
export function toWinAnsi(text: string): string {
  let result = '';
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    if (cp === 0x09 || cp === 0x0a || cp === 0x0d) {
      result += ' ';
    } else if (
      (cp >= 0x20 && cp <= 0x7e) ||
      (cp >= 0xa0 && cp <= 0xff) ||
      WIN_ANSI_EXTRAS.has(cp)
    ) {
      result += ch;
    } else {
      result += '?';
    }
  }
  return result;
}

/** `customer_name` -> `Customer Name` */
export function humanize(key: string): string {
  return key
    .split(/[_\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export function formatValue(value: unknown): string {
  if (value === null || value === undefined || value === '') {
    return '-';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => formatValue(item)).join(', ');
  }
  return JSON.stringify(value);
}

/** Top-to-bottom text cursor that starts a new A4 page when full. */
class PageWriter {
  private page: PDFPage;
  private y: number;
  private readonly width: number;

  constructor(
    private readonly doc: PDFDocument,
    private readonly regular: PDFFont,
    private readonly bold: PDFFont,
  ) {
    this.page = doc.addPage(PageSizes.A4);
    this.y = this.page.getHeight() - MARGIN;
    this.width = this.page.getWidth() - 2 * MARGIN;
  }

  title(text: string, subtitle: string): void {
    this.text(text, this.bold, TITLE_SIZE, ACCENT);
    this.text(subtitle, this.regular, BODY_SIZE, MUTED);
    this.rule();
  }

  section(text: string): void {
    this.y -= SECTION_SIZE;
    this.text(text, this.bold, SECTION_SIZE, ACCENT);
  }

  field(label: string, value: string): void {
    this.text(label.toUpperCase(), this.bold, LABEL_SIZE, MUTED);
    for (const line of value.split('\n')) {
      this.text(line, this.regular, BODY_SIZE, TEXT);
    }
    this.y -= BODY_SIZE * 0.4;
  }

  footer(text: string): void {
    for (const page of this.doc.getPages()) {
      page.drawText(toWinAnsi(text), {
        x: MARGIN,
        y: MARGIN / 2,
        size: FOOTER_SIZE,
        font: this.regular,
        color: MUTED,
      });
    }
  }

  private text(
    raw: string,
    font: PDFFont,
    size: number,
    color: Color,
  ): void {
    for (const line of this.wrap(toWinAnsi(raw), font, size)) {
      this.ensure(size * LINE_HEIGHT);
      this.y -= size * LINE_HEIGHT;
      this.page.drawText(line, { x: MARGIN, y: this.y, size, font, color });
    }
  }

  private rule(): void {
    this.ensure(12);
    this.y -= 6;
    this.page.drawLine({
      start: { x: MARGIN, y: this.y },
      end: { x: MARGIN + this.width, y: this.y },
      thickness: 1.5,
      color: ACCENT,
    });
    this.y -= 6;
  }

  private ensure(height: number): void {
    if (this.y - height < MARGIN) {
      this.page = this.doc.addPage(PageSizes.A4);
      this.y = this.page.getHeight() - MARGIN;
    }
  }

  private wrap(text: string, font: PDFFont, size: number): string[] {
    const words = text.split(' ');
    const lines: string[] = [];
    let current = '';
    for (const word of words) {
      const candidate = current ? `${current} ${word}` : word;
      if (current && font.widthOfTextAtSize(candidate, size) > this.width) {
        lines.push(current);
        current = word;
      } else {
        current = candidate;
      }
    }
    lines.push(current);
    return lines;
  }
}

@Injectable()
export class PdfLibRenderer implements PdfRenderer {
  async render(data: LeadDocumentData): Promise<Buffer> {
    const doc = await PDFDocument.create();
    doc.setTitle(`Lead ${data.referenceNumber}`);
    doc.setCreationDate(data.generatedAt);

    const regular = await doc.embedFont(StandardFonts.Helvetica);
    const bold = await doc.embedFont(StandardFonts.HelveticaBold);
    const writer = new PageWriter(doc, regular, bold);

    writer.title('Lead Application', `Reference ${data.referenceNumber}`);

    writer.section('Lead');
    writer.field('Reference Number', data.referenceNumber);
    writer.field('Status', humanize(data.status));
    writer.field('Source', humanize(data.source));
    writer.field('Submitted', data.createdAt.toISOString().slice(0, 10));

    writer.section('Customer');
    writer.field('Name', formatValue(data.customer.name));
    writer.field('Email', formatValue(data.customer.email));
    writer.field('Phone', formatValue(data.customer.phone));

    writer.section('Product');
    writer.field('Product', data.product.name);
    writer.field('Category', data.product.subCategory);

    if (data.agent) {
      writer.section('Agent');
      writer.field('Agent Code', data.agent.code);
      writer.field('Name', formatValue(data.agent.name));
    }

    const entries = Object.entries(data.formData);
    if (entries.length > 0) {
      writer.section('Application Details');
      for (const [key, value] of entries) {
        writer.field(humanize(key), formatValue(value));
      }
    }

    writer.footer(`Generated ${data.generatedAt.toISOString()}`);

    return Buffer.from(await doc.save());
  }
}
