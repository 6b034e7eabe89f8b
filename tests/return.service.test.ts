import { describe, expect, it, vi } from 'vitest';
import { ReturnService } from '../src/services/return.service';
import { NotificationDispatcher } from '../src/services/notification.service';
import { SlipRenderer } from '../src/services/slip.service';
import type { StaffContext } from '../src/types/admin.types';
import { AvailabilityStatus } from '../src/types/item.types';
import type { OverReturnPolicy } from '../src/types/return.types';
import { InMemoryStore } from './helpers/in-memory-store';
import { CapturingSender, seedBorrower } from './helpers/server';

const staff: StaffContext = { adminId: 1, email: 'desk@example.edu', name: 'Desk Staff' };

function setup(policy: OverReturnPolicy = 'reject', email: string | null = null) {
  const store = new InMemoryStore();
  const repos = store.repositories();
  const sender = new CapturingSender();
  const dispatcher = new NotificationDispatcher(sender, { maxAttempts: 1, retryDelayMs: 1 });
  const service = new ReturnService(
    repos.borrowers,
    repos.transactions,
    dispatcher,
    new SlipRenderer({ institutionName: 'Test Laboratory', timeZone: 'UTC' }),
    { overReturnPolicy: policy, now: () => new Date('2026-02-01T10:00:00Z') }
  );

  const borrower = seedBorrower(store, undefined, email);
  const beaker = store.addItem('Beaker', 10);
  const first = store.addTransaction({ borrowerId: borrower.id, itemId: beaker.id, borrowedQty: 2 });
  const second = store.addTransaction({ borrowerId: borrower.id, itemId: beaker.id, borrowedQty: 3 });

  return { store, repos, sender, dispatcher, service, borrower, beaker, first, second };
}

describe('ReturnService.submitReturn', () => {
  it('credits a partial return oldest-first and moves the ledger', async () => {
    const { store, service, borrower, beaker, first, second } = setup();

    const receipt = await service.submitReturn(
      { borrowerId: borrower.id, claims: [{ itemName: 'Beaker', quantity: 4, condition: 'ok' }] },
      staff
    );

    expect(receipt.items).toEqual([{ itemName: 'Beaker', quantity: 4, condition: 'ok' }]);
    expect(receipt.transactionIds).toEqual([first.id, second.id]);
    expect(receipt.referenceNumber).toBe('0000001');
    expect(receipt.processedBy).toBe('Desk Staff');
    expect(receipt.truncated).toEqual([]);

    expect(store.transactions.get(first.id)?.returnedQty).toBe(2);
    expect(store.transactions.get(second.id)?.returnedQty).toBe(2);
    expect(store.item(beaker.id).borrowedQuantity).toBe(1);
    expect(store.outstandingFor(beaker.id)).toBe(1);
  });

  it('rejects an over-return without changing anything', async () => {
    const { store, service, borrower, beaker } = setup('reject');

    await expect(
      service.submitReturn({ borrowerId: borrower.id, claims: [{ itemName: 'Beaker', quantity: 6 }] }, staff)
    ).rejects.toMatchObject({
      code: 'OVER_RETURN',
      statusCode: 409,
      details: { items: [{ itemName: 'Beaker', claimed: 6, outstanding: 5 }] },
    });

    expect(store.item(beaker.id).borrowedQuantity).toBe(5);
    expect([...store.transactions.values()].every((row) => row.returnedQty === 0)).toBe(true);
  });

  it('truncates an over-return to what is outstanding when configured to', async () => {
    const { store, service, borrower, beaker } = setup('truncate');

    const receipt = await service.submitReturn(
      { borrowerId: borrower.id, claims: [{ itemName: 'Beaker', quantity: 6 }] },
      staff
    );

    expect(receipt.items).toEqual([{ itemName: 'Beaker', quantity: 5, condition: null }]);
    expect(receipt.truncated).toEqual([{ itemName: 'Beaker', claimed: 6, credited: 5 }]);
    expect(store.item(beaker.id).borrowedQuantity).toBe(0);
  });

  it('lists skipped claims on the receipt', async () => {
    const { service, borrower } = setup();

    const receipt = await service.submitReturn(
      {
        borrowerId: borrower.id,
        claims: [
          { itemName: 'Beaker', quantity: 'abc' },
          { itemName: 'Beaker', quantity: '1' },
        ],
      },
      staff
    );

    expect(receipt.items).toEqual([{ itemName: 'Beaker', quantity: 1, condition: null }]);
    expect(receipt.skipped).toEqual([
      { index: 0, itemName: 'Beaker', reason: 'Quantity must be a positive whole number' },
    ]);
  });

  it('fails with NO_ITEMS_RETURNED when every claim is skipped', async () => {
    const { service, borrower } = setup();

    await expect(
      service.submitReturn({ borrowerId: borrower.id, claims: [{ itemName: 'Beaker', quantity: 0 }] }, staff)
    ).rejects.toMatchObject({ code: 'NO_ITEMS_RETURNED', statusCode: 422 });
  });

  it('fails with NO_ITEMS_RETURNED when nothing matches an open row', async () => {
    const { service, borrower } = setup('truncate');

    await expect(
      service.submitReturn({ borrowerId: borrower.id, claims: [{ itemName: 'Flask', quantity: 1 }] }, staff)
    ).rejects.toMatchObject({
      code: 'NO_ITEMS_RETURNED',
      statusCode: 422,
      details: { skipped: [], unmatched: ['Flask'] },
    });
  });

  it('fails with BORROWER_NOT_FOUND for an unknown borrower', async () => {
    const { service } = setup();

    await expect(
      service.submitReturn({ borrowerId: 999, claims: [{ itemName: 'Beaker', quantity: 1 }] }, staff)
    ).rejects.toMatchObject({ code: 'BORROWER_NOT_FOUND', statusCode: 404 });
  });

  it('lets only one of two overlapping returns commit', async () => {
    const { store, service, borrower, beaker } = setup();
    const claim = { borrowerId: borrower.id, claims: [{ itemName: 'Beaker', quantity: 3 }] };

    const results = await Promise.allSettled([
      service.submitReturn(claim, staff),
      service.submitReturn(claim, staff),
    ]);

    const fulfilled = results.filter((r) => r.status === 'fulfilled');
    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(['RETURN_CONFLICT', 'OVER_RETURN']).toContain(rejected[0]?.reason.code);

    expect(store.item(beaker.id).borrowedQuantity).toBe(2);
    expect(store.outstandingFor(beaker.id)).toBe(2);
  });

  it('keeps every item untouched when one item of the return loses a race', async () => {
    const { store, repos, service, borrower, beaker, first, second } = setup();
    const flask = store.addItem('Flask', 4);
    const flaskRow = store.addTransaction({ borrowerId: borrower.id, itemId: flask.id, borrowedQty: 2 });

    // Another desk returns the flasks after this submission has read the open rows
    const readOpenRows = repos.transactions.findOpenByBorrower.bind(repos.transactions);
    vi.spyOn(repos.transactions, 'findOpenByBorrower').mockImplementationOnce(async (borrowerId) => {
      const open = await readOpenRows(borrowerId);
      await service.submitReturn({ borrowerId, claims: [{ itemName: 'Flask', quantity: 2 }] }, staff);
      return open;
    });

    await expect(
      service.submitReturn(
        {
          borrowerId: borrower.id,
          claims: [
            { itemName: 'Beaker', quantity: 4 },
            { itemName: 'Flask', quantity: 2 },
          ],
        },
        staff
      )
    ).rejects.toMatchObject({
      code: 'RETURN_CONFLICT',
      statusCode: 409,
      details: { transactionId: flaskRow.id },
    });

    expect(store.transactions.get(first.id)?.returnedQty).toBe(0);
    expect(store.transactions.get(second.id)?.returnedQty).toBe(0);
    expect(store.item(beaker.id).borrowedQuantity).toBe(5);

    expect(store.transactions.get(flaskRow.id)?.returnedQty).toBe(2);
    expect(store.item(flask.id).borrowedQuantity).toBe(0);
  });

  it('makes a fully borrowed item available again after a partial return', async () => {
    const { store, service } = setup();
    const owner = seedBorrower(store);
    const scale = store.addItem('Analytical Balance', 5);
    const older = store.addTransaction({ borrowerId: owner.id, itemId: scale.id, borrowedQty: 3 });
    const newer = store.addTransaction({ borrowerId: owner.id, itemId: scale.id, borrowedQty: 2 });

    expect(store.toItem(store.item(scale.id)).availabilityStatus).toBe(AvailabilityStatus.UNAVAILABLE);

    await service.submitReturn(
      { borrowerId: owner.id, claims: [{ itemName: 'Analytical Balance', quantity: 4 }] },
      staff
    );

    expect(store.transactions.get(older.id)?.returnedQty).toBe(3);
    expect(store.transactions.get(newer.id)?.returnedQty).toBe(1);
    expect(store.item(scale.id).borrowedQuantity).toBe(1);
    expect(store.toItem(store.item(scale.id))).toMatchObject({
      availableQuantity: 4,
      availabilityStatus: AvailabilityStatus.AVAILABLE,
    });
  });

  it('mails a return slip to a borrower with an email address', async () => {
    const { sender, dispatcher, service, borrower } = setup('reject', 'sam@example.edu');

    await service.submitReturn({ borrowerId: borrower.id, claims: [{ itemName: 'Beaker', quantity: 1 }] }, staff);
    await dispatcher.drain();

    expect(sender.sent).toHaveLength(1);
    expect(sender.sent[0]?.to).toBe('sam@example.edu');
    expect(sender.sent[0]?.subject).toBe('Return slip 0000001');
    expect(sender.sent[0]?.attachments?.[0]?.filename).toBe('return-slip-0000001.pdf');
    expect(sender.sent[0]?.attachments?.[0]?.content.subarray(0, 4).toString()).toBe('%PDF');
  });
});
