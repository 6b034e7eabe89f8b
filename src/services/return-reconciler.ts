import type { BorrowTransaction, ReturnAllocationParams } from '../types/transaction.types';
import type {
  CreditedItem,
  ReturnClaim,
  ReturnClaimInput,
  SkippedClaim,
  TruncatedClaim,
} from '../types/return.types';

/**
 * Return Reconciler
 *
 * Maps "N returned of item X" claims onto a borrower's open transaction rows.
 * Pure planning only: the caller reads the open rows, plans here, and hands
 * the allocations to the atomic apply step, which re-checks every row.
 */

export interface NormalizedClaims {
  claims: ReturnClaim[];
  skipped: SkippedClaim[];
}

export interface ReturnPlan {
  allocations: ReturnAllocationParams[];
  credited: CreditedItem[];
  /** Claims that asked for more than the borrower holds of the item */
  overReturns: TruncatedClaim[];
}

type OpenRow = Pick<BorrowTransaction, 'id' | 'itemName' | 'outstandingQty'>;

function parseQuantity(raw: unknown): number | null {
  let value: number;

  if (typeof raw === 'number') {
    value = raw;
  } else if (typeof raw === 'string' && /^\s*\d+\s*$/.test(raw)) {
    value = Number(raw.trim());
  } else {
    return null;
  }

  return Number.isSafeInteger(value) && value > 0 ? value : null;
}

/**
 * Keep positive integer quantities; everything else is skipped and reported
 */
export function normalizeClaims(inputs: ReturnClaimInput[]): NormalizedClaims {
  const claims: ReturnClaim[] = [];
  const skipped: SkippedClaim[] = [];

  inputs.forEach((input, index) => {
    const itemName = input.itemName.trim();
    const quantity = parseQuantity(input.quantity);

    if (!itemName) {
      skipped.push({ index, itemName, reason: 'Item name is empty' });
      return;
    }

    if (quantity === null) {
      skipped.push({ index, itemName, reason: 'Quantity must be a positive whole number' });
      return;
    }

    const condition = input.condition?.trim();
    claims.push({ itemName, quantity, condition: condition ? condition : null });
  });

  return { claims, skipped };
}

/**
 * Plan the credits for a set of claims (FIFO)
 *
 * For each claim the borrower's open rows for that item are walked by
 * ascending id, crediting min(remaining, outstanding) per row until the claim
 * is used up. Balances carry across claims, so two claims for the same item
 * never credit the same unit twice.
 */
export function planReturn(claims: ReturnClaim[], openRows: OpenRow[]): ReturnPlan {
  const rows = [...openRows].sort((a, b) => a.id - b.id);
  const balances = new Map<number, number>(rows.map((row) => [row.id, row.outstandingQty]));
  const allocations = new Map<number, ReturnAllocationParams>();
  const credited: CreditedItem[] = [];
  const overReturns: TruncatedClaim[] = [];

  for (const claim of claims) {
    let remaining = claim.quantity;

    for (const row of rows) {
      if (remaining === 0) break;
      if (row.itemName !== claim.itemName) continue;

      const outstanding = balances.get(row.id) ?? 0;
      const credit = Math.min(remaining, outstanding);
      if (credit === 0) continue;

      balances.set(row.id, outstanding - credit);
      remaining -= credit;

      const existing = allocations.get(row.id);
      allocations.set(row.id, {
        transactionId: row.id,
        credited: (existing?.credited ?? 0) + credit,
        conditionAfter: claim.condition ?? existing?.conditionAfter ?? null,
      });
    }

    const creditedQuantity = claim.quantity - remaining;

    if (creditedQuantity > 0) {
      credited.push({ itemName: claim.itemName, quantity: creditedQuantity, condition: claim.condition });
    }

    if (remaining > 0) {
      overReturns.push({ itemName: claim.itemName, claimed: claim.quantity, credited: creditedQuantity });
    }
  }

  return {
    allocations: [...allocations.values()].sort((a, b) => a.transactionId - b.transactionId),
    credited,
    overReturns,
  };
}
