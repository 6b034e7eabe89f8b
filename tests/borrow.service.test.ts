import { describe, expect, it, vi } from 'vitest';
import { BorrowService } from '../src/services/borrow.service';
import { BorrowerService } from '../src/services/borrower.service';
import { NotificationDispatcher } from '../src/services/notification.service';
import { SlipRenderer } from '../src/services/slip.service';
import type { StaffContext } from '../src/types/admin.types';
import { BorrowerRole } from '../src/types/borrower.types';
import type { IssueBorrowInput } from '../src/types/transaction.types';
import { InMemoryStore } from './helpers/in-memory-store';
import { CapturingSender, seedBorrower } from './helpers/server';

const staff: StaffContext = { adminId: 1, email: 'desk@example.edu', name: 'Desk Staff' };

function setup(email: string | null = null) {
  let clock = new Date('2026-02-01T10:00:00Z');
  const store = new InMemoryStore(() => clock);
  const repos = store.repositories();
  const sender = new CapturingSender();
  const dispatcher = new NotificationDispatcher(sender, { maxAttempts: 1, retryDelayMs: 1 });
  const service = new BorrowService(
    repos.borrowers,
    repos.items,
    repos.transactions,
    dispatcher,
    new SlipRenderer({ institutionName: 'Test Laboratory', timeZone: 'UTC' }),
    { dedupeWindowMs: 10_000, now: () => clock }
  );

  const borrower = seedBorrower(store, BorrowerRole.STUDENT, email);
  const instructor = seedBorrower(store, BorrowerRole.INSTRUCTOR);
  const beaker = store.addItem('Beaker', 5);
  const flask = store.addItem('Flask', 2);

  const input = (lines: IssueBorrowInput['lines']): IssueBorrowInput => ({
    borrowerRfid: borrower.rfid,
    instructorRfid: instructor.rfid,
    subject: 'General Chemistry',
    room: 'Lab 2',
    lines,
  });

  const advance = (ms: number) => {
    clock = new Date(clock.getTime() + ms);
  };

  return { store, repos, sender, dispatcher, service, borrower, instructor, beaker, flask, input, advance };
}

describe('BorrowService.issue', () => {
  it('issues every line and increments the ledger', async () => {
    const { store, service, borrower, instructor, beaker, flask, input } = setup();

    const outcome = await service.issue(
      input([
        { itemId: beaker.id, quantity: 2, conditionBefore: 'new' },
        { itemId: flask.id, quantity: 1 },
      ]),
      staff
    );

    expect(outcome.replayed).toBe(false);
    expect(outcome.referenceNumber).toBe('0000001');
    expect(outcome.transactions.map((t) => [t.itemName, t.borrowedQty, t.conditionBefore])).toEqual([
      ['Beaker', 2, 'new'],
      ['Flask', 1, null],
    ]);
    expect(outcome.transactions[0]).toMatchObject({
      borrowerId: borrower.id,
      instructorId: instructor.id,
      issuedByAdminId: 1,
      subject: 'General Chemistry',
      room: 'Lab 2',
      status: 'borrowed',
    });

    expect(store.item(beaker.id).borrowedQuantity).toBe(2);
    expect(store.item(flask.id).borrowedQuantity).toBe(1);
  });

  it('issues nothing when any line lacks stock', async () => {
    const { store, service, beaker, flask, input } = setup();

    await expect(
      service.issue(
        input([
          { itemId: beaker.id, quantity: 1 },
          { itemId: flask.id, quantity: 3 },
        ]),
        staff
      )
    ).rejects.toMatchObject({
      code: 'INSUFFICIENT_STOCK',
      statusCode: 409,
      details: { itemId: flask.id, requested: 3, available: 2 },
    });

    expect(store.transactions.size).toBe(0);
    expect(store.item(beaker.id).borrowedQuantity).toBe(0);
  });

  it('requires an active instructor badge', async () => {
    const { service, borrower, beaker } = setup();

    await expect(
      service.issue(
        {
          borrowerRfid: borrower.rfid,
          instructorRfid: borrower.rfid,
          subject: 'General Chemistry',
          room: 'Lab 2',
          lines: [{ itemId: beaker.id, quantity: 1 }],
        },
        staff
      )
    ).rejects.toMatchObject({ code: 'INVALID_INSTRUCTOR', statusCode: 422 });
  });

  it('rejects unknown borrowers, unknown items and archived items', async () => {
    const { store, service, beaker, input } = setup();

    await expect(
      service.issue({ ...input([{ itemId: beaker.id, quantity: 1 }]), borrowerRfid: 'NO-SUCH-BADGE' }, staff)
    ).rejects.toMatchObject({ code: 'BORROWER_NOT_FOUND', statusCode: 404 });

    await expect(service.issue(input([{ itemId: 999, quantity: 1 }]), staff)).rejects.toMatchObject({
      code: 'ITEM_NOT_FOUND',
      statusCode: 404,
    });

    store.item(beaker.id).archivedAt = new Date();
    await expect(service.issue(input([{ itemId: beaker.id, quantity: 1 }]), staff)).rejects.toMatchObject({
      code: 'ITEM_ARCHIVED',
      statusCode: 409,
    });
  });

  it('replays a duplicate scan inside the dedupe window', async () => {
    const { store, service, beaker, input, advance } = setup();

    const first = await service.issue(input([{ itemId: beaker.id, quantity: 5 }]), staff);
    advance(2_000);
    const repeat = await service.issue(input([{ itemId: beaker.id, quantity: 5 }]), staff);

    expect(repeat.replayed).toBe(true);
    expect(repeat.transactions.map((t) => t.id)).toEqual(first.transactions.map((t) => t.id));
    expect(store.transactions.size).toBe(1);
    expect(store.item(beaker.id).borrowedQuantity).toBe(5);
  });

  it('refuses a rescan with a different quantity inside the dedupe window', async () => {
    const { store, service, beaker, flask, input, advance } = setup();

    await service.issue(input([{ itemId: beaker.id, quantity: 2 }]), staff);
    advance(2_000);

    await expect(
      service.issue(
        input([
          { itemId: flask.id, quantity: 1 },
          { itemId: beaker.id, quantity: 5 },
        ]),
        staff
      )
    ).rejects.toMatchObject({
      code: 'DUPLICATE_SCAN_MISMATCH',
      statusCode: 409,
      details: { itemId: beaker.id, requested: 5, recorded: 2 },
    });

    expect(store.transactions.size).toBe(1);
    expect(store.item(beaker.id).borrowedQuantity).toBe(2);
    expect(store.item(flask.id).borrowedQuantity).toBe(0);
  });

  it('refuses a borrower archived after the badge was looked up', async () => {
    const { store, repos, service, borrower, beaker, input } = setup();
    const borrowers = new BorrowerService(repos.borrowers, repos.transactions);

    // The archive commits while the issue is still checking items
    const readItems = repos.items.findByIds.bind(repos.items);
    vi.spyOn(repos.items, 'findByIds').mockImplementationOnce(async (ids) => {
      const items = await readItems(ids);
      await borrowers.archiveBorrower(borrower.id);
      return items;
    });

    await expect(service.issue(input([{ itemId: beaker.id, quantity: 1 }]), staff)).rejects.toMatchObject({
      code: 'BORROWER_NOT_FOUND',
      statusCode: 404,
    });

    expect(store.borrowers.get(borrower.id)?.archivedAt).not.toBeNull();
    expect(store.transactions.size).toBe(0);
    expect(store.item(beaker.id).borrowedQuantity).toBe(0);
  });

  it('issues again once the dedupe window has passed', async () => {
    const { store, service, beaker, input, advance } = setup();

    await service.issue(input([{ itemId: beaker.id, quantity: 2 }]), staff);
    advance(10_000);
    const later = await service.issue(input([{ itemId: beaker.id, quantity: 2 }]), staff);

    expect(later.replayed).toBe(false);
    expect(store.transactions.size).toBe(2);
    expect(store.item(beaker.id).borrowedQuantity).toBe(4);
  });

  it('mails a borrower slip for a new issue but not for a replay', async () => {
    const { sender, dispatcher, service, beaker, input } = setup('sam@example.edu');

    await service.issue(input([{ itemId: beaker.id, quantity: 1 }]), staff);
    await service.issue(input([{ itemId: beaker.id, quantity: 1 }]), staff);
    await dispatcher.drain();

    expect(sender.sent.map((mail) => mail.subject)).toEqual(["Borrower's slip 0000001"]);
    expect(sender.sent[0]?.attachments?.[0]?.filename).toBe('borrow-slip-0000001.pdf');
  });
});
