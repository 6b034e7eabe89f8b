export type { IItemRepository } from './item.repository';
export type { IBorrowerRepository } from './borrower.repository';
export type { ITransactionRepository, TransactionPage } from './transaction.repository';
export type { IPendingReturnRepository } from './pending-return.repository';
export type { IAdminRepository } from './admin.repository';
