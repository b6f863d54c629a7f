/**
 * ReportPdfService
 * Renders an analysis result into an A4 PDF report; long text flows onto further pages.
 */

import { PDFDocument, PageSizes, StandardFonts, rgb } from 'pdf-lib';
import type { PDFFont, PDFPage } from 'pdf-lib';
import { DIAGNOSIS_LABELS } from '../../config/labels';
import { MEDICAL_DISCLAIMER } from '../../config/model';
import type { LabelTable } from '../../types';

export interface ReportResults {
  full_name: string;
  description: string;
  recommendation: string;
  primary_confidence: number;
  confidence: Record<string, number>;
}

export interface ReportPatient {
  name: string;
  email: string;
}

export interface ReportInput {
  results: ReportResults;
  patient: ReportPatient;
  modelVersion: string;
  generatedAt: Date;
}

export const REPORT_TITLE = 'Medical AI Analysis Report';

const MARGIN = 50;
const LINE_GAP = 4;
const TEXT_COLOR = rgb(0.12, 0.16, 0.22);
const HEADER_FILL = rgb(0.22, 0.25, 0.32);
const LABEL_FILL = rgb(0.95, 0.96, 0.96);
const GRID_COLOR = rgb(0.9, 0.91, 0.92);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value);

// Standard fonts only encode WinAnsi; anything else is replaced.
const toWinAnsi = (text: string): string => text.replace(/[^\x20-\x7E\xA0-\xFF]/g, '?');

interface Fonts {
  regular: PDFFont;
  bold: PDFFont;
}

/**
 * Top-down text layout; starts a new A4 page when the next element would cross the bottom margin.
 */
class ReportWriter {
  private page: PDFPage;
  private y: number;
  private readonly width: number;

  constructor(private readonly doc: PDFDocument, private readonly fonts: Fonts) {
    this.page = doc.addPage(PageSizes.A4);
    this.y = this.page.getHeight() - MARGIN;
    this.width = this.page.getWidth() - MARGIN * 2;
  }

  title(text: string, size = 22): void {
    const safe = toWinAnsi(text);
    const textWidth = this.fonts.bold.widthOfTextAtSize(safe, size);
    this.ensureSpace(size);
    this.y -= size;
    this.page.drawText(safe, {
      x: (this.page.getWidth() - textWidth) / 2,
      y: this.y,
      size,
      font: this.fonts.bold,
      color: TEXT_COLOR
    });
    this.y -= 12;
  }

  heading(text: string): void {
    // keep a heading on the same page as its first line
    this.ensureSpace(14 + 14 + LINE_GAP + 11 + LINE_GAP);
    this.y -= 14;
    this.line(text, this.fonts.bold, 14);
    this.y -= 4;
  }

  paragraph(text: string, size = 11, font: PDFFont = this.fonts.regular): void {
    for (const line of this.wrap(toWinAnsi(text), font, size)) {
      this.line(line, font, size);
    }
    this.y -= 4;
  }

  field(label: string, value: string, size = 11): void {
    const safeLabel = `${toWinAnsi(label)} `;
    const labelWidth = this.fonts.bold.widthOfTextAtSize(safeLabel, size);
    this.ensureSpace(size + LINE_GAP);
    this.y -= size + LINE_GAP;
    this.page.drawText(safeLabel, { x: MARGIN, y: this.y, size, font: this.fonts.bold, color: TEXT_COLOR });
    this.page.drawText(toWinAnsi(value), {
      x: MARGIN + labelWidth,
      y: this.y,
      size,
      font: this.fonts.regular,
      color: TEXT_COLOR
    });
  }

  table(rows: string[][], columnWidths: number[], headerRow: boolean): void {
    const rowHeight = 20;
    const size = 10;
    rows.forEach((row, rowIndex) => {
      const isHeader = headerRow && rowIndex === 0;
      this.ensureSpace(rowHeight);
      this.y -= rowHeight;
      let x = MARGIN;
      row.forEach((cell, columnIndex) => {
        const columnWidth = columnWidths[columnIndex] ?? 0;
        const fill = isHeader ? HEADER_FILL : (!headerRow && columnIndex === 0 ? LABEL_FILL : undefined);
        this.page.drawRectangle({
          x,
          y: this.y,
          width: columnWidth,
          height: rowHeight,
          color: fill,
          borderColor: GRID_COLOR,
          borderWidth: 1
        });
        const font = isHeader || (!headerRow && columnIndex === 0) ? this.fonts.bold : this.fonts.regular;
        this.page.drawText(toWinAnsi(cell), {
          x: x + 6,
          y: this.y + 6,
          size,
          font,
          color: isHeader ? rgb(1, 1, 1) : TEXT_COLOR
        });
        x += columnWidth;
      });
    });
    this.y -= 8;
  }

  centered(text: string, size: number): void {
    const safe = toWinAnsi(text);
    const textWidth = this.fonts.regular.widthOfTextAtSize(safe, size);
    this.ensureSpace(size + LINE_GAP);
    this.y -= size + LINE_GAP;
    this.page.drawText(safe, {
      x: (this.page.getWidth() - textWidth) / 2,
      y: this.y,
      size,
      font: this.fonts.regular,
      color: TEXT_COLOR
    });
  }

  space(points: number): void {
    this.y = Math.max(this.y - points, MARGIN);
  }

  private ensureSpace(needed: number): void {
    if (this.y - needed < MARGIN) {
      this.page = this.doc.addPage(PageSizes.A4);
      this.y = this.page.getHeight() - MARGIN;
    }
  }

  private line(text: string, font: PDFFont, size: number): void {
    this.ensureSpace(size + LINE_GAP);
    this.y -= size + LINE_GAP;
    this.page.drawText(text, { x: MARGIN, y: this.y, size, font, color: TEXT_COLOR });
  }

  private wrap(text: string, font: PDFFont, size: number): string[] {
    const lines: string[] = [];
    let current = '';
    for (const word of text.split(/\s+/).filter(Boolean)) {
      const candidate = current ? `${current} ${word}` : word;
      if (current && font.widthOfTextAtSize(candidate, size) > this.width) {
        lines.push(current);
        current = word;
      } else {
        current = candidate;
      }
    }
    if (current) {
      lines.push(current);
    }
    return lines;
  }
}

const formatAnalysisDate = (date: Date): string =>
  date.toLocaleString('en-US', {
    month: 'long',
    day: '2-digit',
    year: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    hour12: true
  });

export class ReportPdfService {
  /**
   * Validate posted analysis results against the configured labels.
   */
  static parseResults(value: unknown, labels: LabelTable = DIAGNOSIS_LABELS): ReportResults | null {
    if (!isRecord(value)) {
      return null;
    }

    const { full_name, description, recommendation, primary_confidence, confidence: rawConfidence } = value;
    if (
      typeof full_name !== 'string' ||
      typeof description !== 'string' ||
      typeof recommendation !== 'string' ||
      !isNumber(primary_confidence) ||
      !isRecord(rawConfidence)
    ) {
      return null;
    }

    const confidence: Record<string, number> = {};
    for (const label of labels) {
      const score = rawConfidence[label.key];
      if (!isNumber(score)) {
        return null;
      }
      confidence[label.key] = score;
    }

    return { full_name, description, recommendation, primary_confidence, confidence };
  }

  /**
   * Render the report and return the PDF bytes.
   */
  static async render(input: ReportInput, labels: LabelTable = DIAGNOSIS_LABELS): Promise<Uint8Array> {
    const { results, patient, modelVersion, generatedAt } = input;

    const pdfDoc = await PDFDocument.create();
    pdfDoc.setTitle(REPORT_TITLE);
    pdfDoc.setSubject(`Primary diagnosis: ${results.full_name}`);
    pdfDoc.setAuthor('Medical AI Analysis System');
    pdfDoc.setCreationDate(generatedAt);

    const writer = new ReportWriter(pdfDoc, {
      regular: await pdfDoc.embedFont(StandardFonts.Helvetica),
      bold: await pdfDoc.embedFont(StandardFonts.HelveticaBold)
    });

    writer.title(REPORT_TITLE);
    writer.paragraph(`Model: ${modelVersion}`, 14);

    writer.heading('Patient Information');
    writer.table([
      ['Patient Name:', patient.name],
      ['Email:', patient.email],
      ['Analysis Date:', formatAnalysisDate(generatedAt)]
    ], [150, 300], false);

    writer.heading('Analysis Results');
    writer.field('Primary Diagnosis:', results.full_name);
    writer.field('Confidence Level:', `${results.primary_confidence.toFixed(1)}%`);
    writer.space(8);
    writer.field('Description:', '');
    writer.paragraph(results.description);

    writer.heading('Detailed Confidence Scores');
    writer.table([
      ['Condition', 'Confidence'],
      ...labels.map(label => [label.conditionName, `${(results.confidence[label.key] ?? 0).toFixed(1)}%`])
    ], [225, 225], true);

    writer.heading('Medical Recommendations');
    writer.paragraph(results.recommendation);

    writer.heading('Important Disclaimer');
    writer.paragraph(MEDICAL_DISCLAIMER);

    writer.space(20);
    writer.centered(`Report Generated: ${generatedAt.toISOString().replace('T', ' ').slice(0, 19)}`, 8);
    writer.centered(`Generated by Medical AI Analysis System - ${modelVersion}`, 8);

    return pdfDoc.save();
  }

  /**
   * Attachment filename for a report download
   */
  static reportFilename(requested: unknown, generatedAt: Date): string {
    if (typeof requested === 'string') {
      const base = requested.replace(/\.pdf$/i, '').replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^[._]+/, '');
      if (base) {
        return `${base}.pdf`;
      }
    }
    const stamp = generatedAt.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
    return `medical_report_${stamp}.pdf`;
  }
}
