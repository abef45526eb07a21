import { jsPDF } from 'jspdf';
import { createHash } from 'node:crypto';

import { ReportBlock } from '../interfaces';
import { toWinAnsiText } from './win-ansi.util';

const PAGE_MARGIN = 72;
const LINE_HEIGHT_FACTOR = 1.2;
const BULLET_INDENT = 18;
const TABLE_CELL_PADDING = 6;
const TABLE_KEY_SHARE = 0.35;

interface TextStyle {
  size: number;
  weight: 'normal' | 'bold';
  spaceAfter: number;
}

const TITLE_STYLE: TextStyle = { size: 24, weight: 'bold', spaceAfter: 30 };
const HEADING_STYLE: TextStyle = { size: 18, weight: 'bold', spaceAfter: 12 };
const BODY_STYLE: TextStyle = { size: 12, weight: 'normal', spaceAfter: 0 };

export interface PdfRenderOptions {
  /** Written as the document creation date. */
  createdAt: Date;
}

/**
 * 32 hex characters identifying the document, derived from what it shows.
 */
export function reportFileId(blocks: ReportBlock[], createdAt: Date): string {
  return createHash('md5')
    .update(JSON.stringify(blocks))
    .update(createdAt.toISOString())
    .digest('hex')
    .toUpperCase();
}

/**
 * Draws blocks top to bottom on Letter pages, breaking pages as needed.
 */
class PdfReportWriter {
  private cursorY = PAGE_MARGIN;

  constructor(private readonly doc: jsPDF) {}

  private get contentWidth(): number {
    return this.doc.internal.pageSize.getWidth() - PAGE_MARGIN * 2;
  }

  private get bottomLimit(): number {
    return this.doc.internal.pageSize.getHeight() - PAGE_MARGIN;
  }

  public write(block: ReportBlock): void {
    switch (block.type) {
      case 'title':
        this.writeText(block.text, TITLE_STYLE);
        break;
      case 'heading':
        this.writeText(block.text, HEADING_STYLE);
        break;
      case 'paragraph':
        this.writeText(block.text, BODY_STYLE);
        break;
      case 'bullet':
        this.writeBullet(block.text);
        break;
      case 'table':
        this.writeTable(block.rows);
        break;
      case 'spacer':
        this.cursorY += block.height;
        break;
    }
  }

  private ensureSpace(height: number): void {
    if (this.cursorY + height > this.bottomLimit) {
      this.doc.addPage();
      this.cursorY = PAGE_MARGIN;
    }
  }

  private useStyle(style: TextStyle): number {
    this.doc.setFont('helvetica', style.weight);
    this.doc.setFontSize(style.size);
    return style.size * LINE_HEIGHT_FACTOR;
  }

  private wrap(text: string, width: number): string[] {
    const lines: string[] = this.doc.splitTextToSize(
      toWinAnsiText(text),
      width,
    );
    return lines;
  }

  private writeLines(lines: string[], x: number, lineHeight: number): void {
    for (const line of lines) {
      this.ensureSpace(lineHeight);
      this.doc.text(line, x, this.cursorY + lineHeight * 0.8);
      this.cursorY += lineHeight;
    }
  }

  private writeText(text: string, style: TextStyle): void {
    const lineHeight = this.useStyle(style);
    this.writeLines(this.wrap(text, this.contentWidth), PAGE_MARGIN, lineHeight);
    this.cursorY += style.spaceAfter;
  }

  private writeBullet(text: string): void {
    const lineHeight = this.useStyle(BODY_STYLE);
    const lines = this.wrap(text, this.contentWidth - BULLET_INDENT);

    this.ensureSpace(lineHeight);
    this.doc.circle(
      PAGE_MARGIN + BULLET_INDENT / 2,
      this.cursorY + lineHeight / 2,
      1.5,
      'F',
    );
    this.writeLines(lines, PAGE_MARGIN + BULLET_INDENT, lineHeight);
  }

  private writeTable(rows: Array<[string, string]>): void {
    const lineHeight = this.useStyle(BODY_STYLE);
    const keyWidth = this.contentWidth * TABLE_KEY_SHARE;
    const valueWidth = this.contentWidth - keyWidth;
    const innerWidth = (width: number) => width - TABLE_CELL_PADDING * 2;

    this.doc.setLineWidth(1);

    for (const [key, value] of rows) {
      const keyLines = this.wrap(key, innerWidth(keyWidth));
      const valueLines = this.wrap(value, innerWidth(valueWidth));
      const rowHeight =
        Math.max(keyLines.length, valueLines.length) * lineHeight +
        TABLE_CELL_PADDING * 2;

      this.ensureSpace(rowHeight);
      const top = this.cursorY;

      this.doc.rect(PAGE_MARGIN, top, keyWidth, rowHeight);
      this.doc.rect(PAGE_MARGIN + keyWidth, top, valueWidth, rowHeight);
      this.drawCentered(keyLines, PAGE_MARGIN + keyWidth / 2, top, lineHeight);
      this.drawCentered(
        valueLines,
        PAGE_MARGIN + keyWidth + valueWidth / 2,
        top,
        lineHeight,
      );

      this.cursorY = top + rowHeight;
    }
  }

  private drawCentered(
    lines: string[],
    centerX: number,
    top: number,
    lineHeight: number,
  ): void {
    lines.forEach((line, index) => {
      this.doc.text(
        line,
        centerX,
        top + TABLE_CELL_PADDING + lineHeight * (index + 0.8),
        { align: 'center' },
      );
    });
  }
}

/**
 * Renders report blocks to PDF bytes. Identical blocks and `createdAt`
 * always give identical bytes.
 */
export function renderReportPdf(
  blocks: ReportBlock[],
  options: PdfRenderOptions,
): Buffer {
  const doc = new jsPDF({
    unit: 'pt',
    format: 'letter',
    compress: false,
    putOnlyUsedFonts: true,
  });

  doc.setCreationDate(options.createdAt);
  doc.setFileId(reportFileId(blocks, options.createdAt));
  doc.setDocumentProperties({ title: blocks.find(isTitle)?.text ?? '' });

  const writer = new PdfReportWriter(doc);
  blocks.forEach((block) => writer.write(block));

  return Buffer.from(doc.output('arraybuffer'));
}

function isTitle(
  block: ReportBlock,
): block is Extract<ReportBlock, { type: 'title' }> {
  return block.type === 'title';
}
