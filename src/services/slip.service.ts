import PDFDocument from 'pdfkit';
import type { Borrower } from '../types/borrower.types';
import type { BorrowTransaction } from '../types/transaction.types';
import type { ReturnReceipt } from '../types/return.types';
import type { UsageReport } from '../types/report.types';
import { fullName } from '../types/borrower.types';

export interface SlipOptions {
  institutionName: string;
  timeZone: string;
}

export interface BorrowSlipData {
  referenceNumber: string;
  borrower: Borrower;
  instructor: Borrower | null;
  subject: string | null;
  room: string | null;
  issuedBy: string | null;
  transactions: BorrowTransaction[];
}

type Doc = PDFKit.PDFDocument;

/**
 * Slip Renderer
 *
 * Renders borrow slips, return slips and the usage report as PDF buffers.
 * Input is always already-committed data.
 */
export class SlipRenderer {
  constructor(private options: SlipOptions) {}

  renderBorrowSlip(slip: BorrowSlipData): Promise<Buffer> {
    return this.render((doc) => {
      this.header(doc, 'Borrower\'s Slip', slip.referenceNumber);

      this.field(doc, 'Borrower', fullName(slip.borrower));
      this.field(doc, 'ID number', slip.borrower.borrowerCode);
      this.field(doc, 'Department', slip.borrower.department ?? '-');
      this.field(doc, 'Course', slip.borrower.course ?? '-');
      this.field(doc, 'Instructor', slip.instructor ? fullName(slip.instructor) : '-');
      this.field(doc, 'Subject', slip.subject ?? '-');
      this.field(doc, 'Room', slip.room ?? '-');
      const first = slip.transactions[0];
      this.field(doc, 'Date borrowed', first ? this.formatDate(first.borrowedAt) : '-');
      this.field(doc, 'Issued by', slip.issuedBy ?? '-');

      doc.moveDown();
      this.table(
        doc,
        ['Item', 'Qty', 'Condition'],
        slip.transactions.map((t) => [t.itemName ?? `#${t.itemId}`, String(t.borrowedQty), t.conditionBefore ?? '-'])
      );
    });
  }

  renderReturnSlip(receipt: ReturnReceipt): Promise<Buffer> {
    return this.render((doc) => {
      this.header(doc, 'Return Slip', receipt.referenceNumber);

      this.field(doc, 'Borrower', receipt.borrowerName);
      this.field(doc, 'ID number', receipt.borrowerCode);
      this.field(doc, 'Department', receipt.department ?? '-');
      this.field(doc, 'Course', receipt.course ?? '-');
      this.field(doc, 'Date returned', this.formatDate(receipt.returnedAt));
      this.field(doc, 'Received by', receipt.processedBy ?? '-');

      doc.moveDown();
      this.table(
        doc,
        ['Item', 'Qty returned', 'Condition'],
        receipt.items.map((item) => [item.itemName, String(item.quantity), item.condition ?? '-'])
      );
    });
  }

  renderUsageReport(report: UsageReport): Promise<Buffer> {
    return this.render((doc) => {
      this.header(doc, 'Equipment Usage Report', null);

      const from = report.range.from ? this.formatDate(report.range.from) : 'beginning';
      const to = report.range.to ? this.formatDate(report.range.to) : 'now';
      this.field(doc, 'Period', `${from} to ${to}`);
      this.field(doc, 'Generated', this.formatDate(report.generatedAt));

      doc.moveDown();
      this.field(doc, 'Borrow lines', String(report.totalBorrowLines));
      this.field(doc, 'Units borrowed', String(report.unitsBorrowedInRange));
      this.field(doc, 'Units currently out', String(report.unitsCurrentlyOut));
      this.field(doc, 'Units available', String(report.unitsAvailable));
      this.field(doc, 'Unavailable items', String(report.unavailableItemCount));

      doc.moveDown().font('Helvetica-Bold').fontSize(12).text('Most borrowed');
      this.table(
        doc,
        ['Item', 'Category', 'Units'],
        report.topBorrowedItems.map((item) => [item.itemName, item.category ?? '-', String(item.totalBorrowed)])
      );

      doc.moveDown().font('Helvetica-Bold').fontSize(12).text('Currently outstanding');
      this.table(
        doc,
        ['Item', 'Category', 'Out'],
        report.outstandingItems.map((item) => [item.itemName, item.category ?? '-', String(item.outstanding)])
      );

      doc.moveDown().font('Helvetica-Bold').fontSize(12).text('Last recorded condition');
      this.table(
        doc,
        ['Item', 'Condition'],
        report.latestConditions.map((entry) => [entry.itemName, entry.condition ?? '-'])
      );
    });
  }

  private render(draw: (doc: Doc) => void): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const doc = new PDFDocument({ size: 'A4', margin: 50 });
      const chunks: Buffer[] = [];

      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);

      draw(doc);
      doc.end();
    });
  }

  private header(doc: Doc, title: string, referenceNumber: string | null): void {
    doc.font('Helvetica-Bold').fontSize(16).text(this.options.institutionName, { align: 'center' });
    doc.font('Helvetica').fontSize(13).text(title, { align: 'center' });
    if (referenceNumber) {
      doc.fontSize(10).text(`Reference No. ${referenceNumber}`, { align: 'right' });
    }
    doc.moveDown();
  }

  private field(doc: Doc, label: string, value: string): void {
    doc.font('Helvetica-Bold').fontSize(10).text(`${label}: `, { continued: true });
    doc.font('Helvetica').text(value);
  }

  private table(doc: Doc, headings: string[], rows: string[][]): void {
    const left = doc.page.margins.left;
    const width = doc.page.width - left - doc.page.margins.right;
    const columnWidth = width / headings.length;

    const drawRow = (cells: string[], bold: boolean): void => {
      const y = doc.y;
      doc.font(bold ? 'Helvetica-Bold' : 'Helvetica').fontSize(10);
      cells.forEach((cell, index) => {
        doc.text(cell, left + index * columnWidth, y, { width: columnWidth - 8 });
      });
      doc.x = left;
      doc.moveDown(0.5);
    };

    drawRow(headings, true);
    if (rows.length === 0) {
      doc.font('Helvetica-Oblique').fontSize(10).text('None', left);
      return;
    }
    rows.forEach((row) => drawRow(row, false));
  }

  private formatDate(date: Date): string {
    return date.toLocaleString('en-US', { timeZone: this.options.timeZone });
  }
}
