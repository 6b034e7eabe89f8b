import { describe, expect, it } from 'vitest';
import { SlipRenderer } from '../src/services/slip.service';
import { buildUsageReport } from '../src/services/report-builder';
import { BorrowerRole } from '../src/types/borrower.types';
import { InMemoryStore } from './helpers/in-memory-store';
import { seedBorrower } from './helpers/server';

const renderer = new SlipRenderer({ institutionName: 'Test Laboratory', timeZone: 'UTC' });

const isPdf = (buffer: Buffer): boolean => buffer.subarray(0, 5).toString('latin1') === '%PDF-';

describe('SlipRenderer', () => {
  const store = new InMemoryStore(() => new Date('2026-02-01T10:00:00Z'));
  const borrower = seedBorrower(store);
  const instructor = seedBorrower(store, BorrowerRole.INSTRUCTOR);
  const beaker = store.addItem('Beaker', 5);
  const line = store.addTransaction({ borrowerId: borrower.id, itemId: beaker.id, borrowedQty: 2 });

  it('renders a borrower slip', async () => {
    const pdf = await renderer.renderBorrowSlip({
      referenceNumber: line.referenceNumber,
      borrower,
      instructor,
      subject: 'General Chemistry',
      room: 'Lab 2',
      issuedBy: 'Desk Staff',
      transactions: [line],
    });

    expect(isPdf(pdf)).toBe(true);
  });

  it('renders a return slip', async () => {
    const pdf = await renderer.renderReturnSlip({
      referenceNumber: '0000001',
      borrowerId: borrower.id,
      borrowerName: 'Sam Tester',
      borrowerCode: borrower.borrowerCode,
      department: null,
      course: null,
      items: [{ itemName: 'Beaker', quantity: 2, condition: 'ok' }],
      skipped: [],
      truncated: [],
      transactionIds: [line.id],
      returnedAt: new Date('2026-02-02T10:00:00Z'),
      processedBy: null,
    });

    expect(isPdf(pdf)).toBe(true);
  });

  it('renders an empty usage report', async () => {
    const report = buildUsageReport({
      range: { from: new Date('2026-01-01T00:00:00Z') },
      items: [],
      borrowedInRange: [],
      open: [],
      returned: [],
      generatedAt: new Date('2026-02-02T10:00:00Z'),
    });

    expect(isPdf(await renderer.renderUsageReport(report))).toBe(true);
  });
});
