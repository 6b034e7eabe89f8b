import { describe, expect, it } from 'vitest';
import { normalizeClaims, planReturn } from '../src/services/return-reconciler';

const row = (id: number, itemName: string, outstandingQty: number) => ({ id, itemName, outstandingQty });

describe('normalizeClaims', () => {
  it('keeps positive whole quantities and trims names and conditions', () => {
    const result = normalizeClaims([
      { itemName: ' Beaker ', quantity: '3', condition: ' chipped ' },
      { itemName: 'Flask', quantity: 2 },
    ]);

    expect(result.claims).toEqual([
      { itemName: 'Beaker', quantity: 3, condition: 'chipped' },
      { itemName: 'Flask', quantity: 2, condition: null },
    ]);
    expect(result.skipped).toEqual([]);
  });

  it('skips zero, negative, fractional, non-numeric and missing quantities', () => {
    const result = normalizeClaims([
      { itemName: 'Flask', quantity: 0 },
      { itemName: 'Flask', quantity: -1 },
      { itemName: 'Pipette', quantity: 2.5 },
      { itemName: 'Pipette', quantity: 'abc' },
      { itemName: 'Burette', quantity: null },
      { itemName: 'Burette', quantity: '' },
    ]);

    expect(result.claims).toEqual([]);
    expect(result.skipped.map((s) => s.index)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(result.skipped[3]).toEqual({
      index: 3,
      itemName: 'Pipette',
      reason: 'Quantity must be a positive whole number',
    });
  });

  it('skips claims without an item name', () => {
    const result = normalizeClaims([{ itemName: '   ', quantity: 1 }]);

    expect(result.claims).toEqual([]);
    expect(result.skipped).toEqual([{ index: 0, itemName: '', reason: 'Item name is empty' }]);
  });

  it('treats an empty condition as no condition', () => {
    const result = normalizeClaims([{ itemName: 'Beaker', quantity: 1, condition: '  ' }]);

    expect(result.claims).toEqual([{ itemName: 'Beaker', quantity: 1, condition: null }]);
  });
});

describe('planReturn', () => {
  it('credits the oldest open row first and spills into the next', () => {
    const plan = planReturn(
      [{ itemName: 'Beaker', quantity: 4, condition: null }],
      [row(1, 'Beaker', 2), row(2, 'Beaker', 3)]
    );

    expect(plan.allocations).toEqual([
      { transactionId: 1, credited: 2, conditionAfter: null },
      { transactionId: 2, credited: 2, conditionAfter: null },
    ]);
    expect(plan.credited).toEqual([{ itemName: 'Beaker', quantity: 4, condition: null }]);
    expect(plan.overReturns).toEqual([]);
  });

  it('orders by id regardless of input order', () => {
    const plan = planReturn(
      [{ itemName: 'Beaker', quantity: 1, condition: null }],
      [row(5, 'Beaker', 1), row(3, 'Beaker', 1)]
    );

    expect(plan.allocations).toEqual([{ transactionId: 3, credited: 1, conditionAfter: null }]);
  });

  it('carries balances across claims for the same item', () => {
    const plan = planReturn(
      [
        { itemName: 'Beaker', quantity: 2, condition: 'good' },
        { itemName: 'Beaker', quantity: 2, condition: 'scratched' },
      ],
      [row(1, 'Beaker', 2), row(2, 'Beaker', 3)]
    );

    expect(plan.allocations).toEqual([
      { transactionId: 1, credited: 2, conditionAfter: 'good' },
      { transactionId: 2, credited: 2, conditionAfter: 'scratched' },
    ]);
    expect(plan.overReturns).toEqual([]);
  });

  it('merges two claims landing on the same row into one allocation', () => {
    const plan = planReturn(
      [
        { itemName: 'Beaker', quantity: 1, condition: null },
        { itemName: 'Beaker', quantity: 2, condition: null },
      ],
      [row(7, 'Beaker', 5)]
    );

    expect(plan.allocations).toEqual([{ transactionId: 7, credited: 3, conditionAfter: null }]);
    expect(plan.credited).toEqual([
      { itemName: 'Beaker', quantity: 1, condition: null },
      { itemName: 'Beaker', quantity: 2, condition: null },
    ]);
  });

  it('reports the part of a claim that exceeds what is outstanding', () => {
    const plan = planReturn(
      [{ itemName: 'Beaker', quantity: 7, condition: null }],
      [row(1, 'Beaker', 2), row(2, 'Beaker', 3)]
    );

    expect(plan.allocations).toEqual([
      { transactionId: 1, credited: 2, conditionAfter: null },
      { transactionId: 2, credited: 3, conditionAfter: null },
    ]);
    expect(plan.credited).toEqual([{ itemName: 'Beaker', quantity: 5, condition: null }]);
    expect(plan.overReturns).toEqual([{ itemName: 'Beaker', claimed: 7, credited: 5 }]);
  });

  it('only matches rows of the claimed item', () => {
    const plan = planReturn(
      [{ itemName: 'Flask', quantity: 1, condition: null }],
      [row(1, 'Beaker', 2)]
    );

    expect(plan.allocations).toEqual([]);
    expect(plan.credited).toEqual([]);
    expect(plan.overReturns).toEqual([{ itemName: 'Flask', claimed: 1, credited: 0 }]);
  });

  it('never credits a row beyond its outstanding quantity', () => {
    const open = [row(1, 'Beaker', 1), row(2, 'Flask', 4), row(3, 'Beaker', 2), row(4, 'Flask', 1)];
    const claimSets = [
      [{ itemName: 'Beaker', quantity: 10, condition: null }],
      [
        { itemName: 'Flask', quantity: 3, condition: null },
        { itemName: 'Flask', quantity: 3, condition: null },
      ],
      [
        { itemName: 'Beaker', quantity: 2, condition: null },
        { itemName: 'Flask', quantity: 5, condition: null },
        { itemName: 'Beaker', quantity: 2, condition: null },
      ],
    ];

    for (const claims of claimSets) {
      const plan = planReturn(claims, open);

      for (const allocation of plan.allocations) {
        const target = open.find((r) => r.id === allocation.transactionId);
        expect(allocation.credited).toBeGreaterThan(0);
        expect(allocation.credited).toBeLessThanOrEqual(target?.outstandingQty ?? 0);
      }

      const creditedTotal = plan.allocations.reduce((sum, a) => sum + a.credited, 0);
      const reportedTotal = plan.credited.reduce((sum, c) => sum + c.quantity, 0);
      expect(creditedTotal).toBe(reportedTotal);
    }
  });
});
