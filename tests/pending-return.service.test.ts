import { describe, expect, it } from 'vitest';
import { PendingReturnService } from '../src/services/pending-return.service';
import { ReturnService } from '../src/services/return.service';
import { NotificationDispatcher } from '../src/services/notification.service';
import { SlipRenderer } from '../src/services/slip.service';
import type { StaffContext } from '../src/types/admin.types';
import { InMemoryStore } from './helpers/in-memory-store';
import { seedBorrower } from './helpers/server';

const staff: StaffContext = { adminId: 7, email: 'desk@example.edu', name: 'Desk Staff' };

function setup(enabled: boolean) {
  const store = new InMemoryStore();
  const repos = store.repositories();
  const returnService = new ReturnService(
    repos.borrowers,
    repos.transactions,
    new NotificationDispatcher(null, { maxAttempts: 1, retryDelayMs: 1 }),
    new SlipRenderer({ institutionName: 'Test Laboratory', timeZone: 'UTC' }),
    { overReturnPolicy: 'reject' }
  );
  const service = new PendingReturnService(
    repos.pendingReturns,
    repos.borrowers,
    repos.transactions,
    returnService,
    { enabled }
  );

  const borrower = seedBorrower(store);
  const beaker = store.addItem('Beaker', 10);
  const open = store.addTransaction({ borrowerId: borrower.id, itemId: beaker.id, borrowedQty: 3 });

  return { store, service, borrower, beaker, open };
}

describe('PendingReturnService', () => {
  it('applies kiosk returns immediately when staging is off', async () => {
    const { store, service, borrower, beaker } = setup(false);

    const outcome = await service.submitKioskReturn(
      { borrowerRfid: borrower.rfid, claims: [{ itemName: 'Beaker', quantity: 2 }] },
      staff
    );

    expect(outcome.mode).toBe('applied');
    expect(store.pendingReturns.size).toBe(0);
    expect(store.item(beaker.id).borrowedQuantity).toBe(1);
  });

  it('stages kiosk returns without touching the ledger when staging is on', async () => {
    const { store, service, borrower, beaker, open } = setup(true);

    const outcome = await service.submitKioskReturn(
      {
        borrowerRfid: borrower.rfid,
        claims: [
          { itemName: ' Beaker ', quantity: '2', condition: 'dusty' },
          { itemName: 'Beaker', quantity: 'two' },
        ],
      },
      staff
    );

    if (outcome.mode !== 'staged') throw new Error('expected a staged return');
    expect(outcome.pendingReturn).toMatchObject({
      borrowerId: borrower.id,
      referenceTransactionId: open.id,
      claims: [{ itemName: 'Beaker', quantity: 2, condition: 'dusty' }],
      status: 'pending',
      submittedByAdminId: 7,
    });
    expect(store.pendingReturns.size).toBe(1);
    expect(store.item(beaker.id).borrowedQuantity).toBe(3);
  });

  it('refuses to stage a submission with no valid claims', async () => {
    const { service, borrower } = setup(true);

    await expect(
      service.submitKioskReturn({ borrowerRfid: borrower.rfid, claims: [{ itemName: 'Beaker', quantity: 0 }] }, staff)
    ).rejects.toMatchObject({ code: 'NO_ITEMS_RETURNED', statusCode: 422 });
  });

  it('rejects an unknown badge', async () => {
    const { service } = setup(true);

    await expect(
      service.submitKioskReturn({ borrowerRfid: 'NO-SUCH-BADGE', claims: [{ itemName: 'Beaker', quantity: 1 }] }, staff)
    ).rejects.toMatchObject({ code: 'BORROWER_NOT_FOUND', statusCode: 404 });
  });

  it('approves a staged return once', async () => {
    const { store, service, borrower, beaker, open } = setup(true);
    const staged = await service.submitKioskReturn(
      { borrowerRfid: borrower.rfid, claims: [{ itemName: 'Beaker', quantity: 2 }] },
      staff
    );
    if (staged.mode !== 'staged') throw new Error('expected a staged return');

    const decision = await service.approve(staged.pendingReturn.id, staff);

    expect(decision.pendingReturn.status).toBe('completed');
    expect(decision.receipt?.transactionIds).toEqual([open.id]);
    expect(store.pendingReturns.size).toBe(0);
    expect(store.item(beaker.id).borrowedQuantity).toBe(1);
    expect(store.transactions.get(open.id)?.returnedByAdminId).toBe(7);

    await expect(service.approve(staged.pendingReturn.id, staff)).rejects.toMatchObject({
      code: 'PENDING_RETURN_NOT_FOUND',
      statusCode: 404,
    });
    expect(store.item(beaker.id).borrowedQuantity).toBe(1);
  });

  it('applies only one of two simultaneous approvals', async () => {
    const { store, service, borrower, beaker } = setup(true);
    const staged = await service.submitKioskReturn(
      { borrowerRfid: borrower.rfid, claims: [{ itemName: 'Beaker', quantity: 2 }] },
      staff
    );
    if (staged.mode !== 'staged') throw new Error('expected a staged return');

    const results = await Promise.allSettled([
      service.approve(staged.pendingReturn.id, staff),
      service.approve(staged.pendingReturn.id, staff),
    ]);

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    expect(store.item(beaker.id).borrowedQuantity).toBe(1);
  });

  it('declines a staged return without changing the ledger', async () => {
    const { store, service, borrower, beaker } = setup(true);
    const staged = await service.submitKioskReturn(
      { borrowerRfid: borrower.rfid, claims: [{ itemName: 'Beaker', quantity: 2 }] },
      staff
    );
    if (staged.mode !== 'staged') throw new Error('expected a staged return');

    const decision = await service.decline(staged.pendingReturn.id, staff);

    expect(decision.pendingReturn.status).toBe('declined');
    expect(decision.receipt).toBeUndefined();
    expect(store.pendingReturns.size).toBe(0);
    expect(store.item(beaker.id).borrowedQuantity).toBe(3);

    await expect(service.decline(staged.pendingReturn.id, staff)).rejects.toMatchObject({
      code: 'PENDING_RETURN_NOT_FOUND',
    });
  });

  it('lists staged returns oldest first', async () => {
    const { service, borrower } = setup(true);

    for (const quantity of [1, 2]) {
      await service.submitKioskReturn(
        { borrowerRfid: borrower.rfid, claims: [{ itemName: 'Beaker', quantity }] },
        staff
      );
    }

    const pending = await service.listPendingReturns();
    expect(pending.map((p) => p.claims[0]?.quantity)).toEqual([1, 2]);
  });
});
