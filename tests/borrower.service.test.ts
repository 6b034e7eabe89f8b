import { describe, expect, it } from 'vitest';
import { BorrowerService } from '../src/services/borrower.service';
import { InMemoryStore } from './helpers/in-memory-store';
import { seedBorrower } from './helpers/server';

function setup() {
  const store = new InMemoryStore(() => new Date('2026-02-01T10:00:00Z'));
  const repos = store.repositories();
  const service = new BorrowerService(repos.borrowers, repos.transactions);
  const borrower = seedBorrower(store);
  const goggles = store.addItem('Safety Goggles', 10);

  return { store, service, borrower, goggles };
}

describe('BorrowerService.archiveBorrower', () => {
  it('refuses while the borrower still holds items', async () => {
    const { store, service, borrower, goggles } = setup();
    store.addTransaction({ borrowerId: borrower.id, itemId: goggles.id, borrowedQty: 2, returnedQty: 1 });

    await expect(service.archiveBorrower(borrower.id)).rejects.toMatchObject({
      code: 'BORROWER_HAS_OPEN_BORROWS',
      statusCode: 409,
      details: { openTransactions: 1 },
    });
    expect(store.borrowers.get(borrower.id)?.archivedAt).toBeNull();
  });

  it('archives once everything is back, and restores', async () => {
    const { store, service, borrower, goggles } = setup();
    store.addTransaction({ borrowerId: borrower.id, itemId: goggles.id, borrowedQty: 2, returnedQty: 2 });

    const archived = await service.archiveBorrower(borrower.id);
    expect(archived.archivedAt).toEqual(new Date('2026-02-01T10:00:00Z'));

    const again = await service.archiveBorrower(borrower.id);
    expect(again.archivedAt).toEqual(archived.archivedAt);

    const restored = await service.restoreBorrower(borrower.id);
    expect(restored.archivedAt).toBeNull();
  });

  it('reports an unknown borrower', async () => {
    const { service } = setup();

    await expect(service.archiveBorrower(999)).rejects.toMatchObject({
      code: 'BORROWER_NOT_FOUND',
      statusCode: 404,
    });
    await expect(service.restoreBorrower(999)).rejects.toMatchObject({
      code: 'BORROWER_NOT_FOUND',
      statusCode: 404,
    });
  });
});
