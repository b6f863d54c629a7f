import { PDFDocument } from 'pdf-lib';
import { REPORT_TITLE, ReportPdfService } from './ReportPdfService';

const results = {
  full_name: "Alzheimer's Disease",
  description: "The scan shows patterns consistent with Alzheimer's disease, characterized by brain tissue changes.",
  recommendation: 'Consult with a neurologist for comprehensive evaluation and potential treatment options.',
  primary_confidence: 72.5,
  confidence: { control: 20, alzheimer: 72.5, parkinson: 7.5 }
};

describe('ReportPdfService', () => {
  describe('parseResults', () => {
    it('accepts a complete prediction', () => {
      expect(ReportPdfService.parseResults(results)).toEqual(results);
    });

    it('drops confidence keys that are not configured labels', () => {
      const parsed = ReportPdfService.parseResults({
        ...results,
        confidence: { ...results.confidence, other: 1 }
      });

      expect(parsed?.confidence).toEqual({ control: 20, alzheimer: 72.5, parkinson: 7.5 });
    });

    it('rejects missing or malformed results', () => {
      expect(ReportPdfService.parseResults(undefined)).toBeNull();
      expect(ReportPdfService.parseResults('CONTROL')).toBeNull();
      expect(ReportPdfService.parseResults({ ...results, primary_confidence: '72.5' })).toBeNull();
      expect(ReportPdfService.parseResults({ ...results, confidence: { control: 20, alzheimer: 72.5 } })).toBeNull();
    });
  });

  describe('render', () => {
    it('renders a single-page PDF with report metadata', async () => {
      const bytes = await ReportPdfService.render({
        results,
        patient: { name: 'Dr Test', email: 'doctor@example.com' },
        modelVersion: 'TestNet',
        generatedAt: new Date('2026-01-02T03:04:05.000Z')
      });

      expect(Buffer.from(bytes.subarray(0, 5)).toString('latin1')).toBe('%PDF-');

      const loaded = await PDFDocument.load(bytes);
      expect(loaded.getPageCount()).toBe(1);
      expect(loaded.getTitle()).toBe(REPORT_TITLE);
      expect(loaded.getSubject()).toBe("Primary diagnosis: Alzheimer's Disease");
      expect(loaded.getAuthor()).toBe('Medical AI Analysis System');
    });

    it('continues long descriptions and recommendations on further pages', async () => {
      const longText = Array.from({ length: 80 }, () => 'Follow-up imaging is advised to compare against this baseline scan.').join(' ');
      const bytes = await ReportPdfService.render({
        results: { ...results, description: longText, recommendation: `${longText}\n\n${longText}` },
        patient: { name: 'Dr Test', email: 'doctor@example.com' },
        modelVersion: 'TestNet',
        generatedAt: new Date('2026-01-02T03:04:05Z')
      });

      const doc = await PDFDocument.load(bytes);
      expect(doc.getPageCount()).toBeGreaterThan(2);
      for (const page of doc.getPages()) {
        expect(page.getSize()).toEqual({ width: 595.28, height: 841.89 });
      }
    });

    it('renders text outside the standard font encoding', async () => {
      const bytes = await ReportPdfService.render({
        results,
        patient: { name: 'Dr 测试 🧠', email: 'doctor@example.com' },
        modelVersion: 'TestNet',
        generatedAt: new Date('2026-01-02T03:04:05.000Z')
      });

      expect(bytes.length).toBeGreaterThan(0);
    });
  });

  describe('reportFilename', () => {
    const generatedAt = new Date('2026-01-02T03:04:05.000Z');

    it('sanitizes a requested filename', () => {
      expect(ReportPdfService.reportFilename('my report.pdf', generatedAt)).toBe('my_report.pdf');
      expect(ReportPdfService.reportFilename('../../etc/passwd', generatedAt)).toBe('etc_passwd.pdf');
    });

    it('falls back to a timestamped name', () => {
      expect(ReportPdfService.reportFilename(undefined, generatedAt)).toBe('medical_report_20260102_030405.pdf');
      expect(ReportPdfService.reportFilename('...', generatedAt)).toBe('medical_report_20260102_030405.pdf');
    });
  });
});
