import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  IAdminRepository,
  IBorrowerRepository,
  IItemRepository,
  IPendingReturnRepository,
  ITransactionRepository,
} from './repositories/interfaces';
import { ItemRepository } from './repositories/item.repository';
import { BorrowerRepository } from './repositories/borrower.repository';
import { TransactionRepository } from './repositories/transaction.repository';
import { PendingReturnRepository } from './repositories/pending-return.repository';
import { AdminRepository } from './repositories/admin.repository';
import { ItemService } from './services/item.service';
import { BorrowerService } from './services/borrower.service';
import { BorrowService } from './services/borrow.service';
import { ReturnService } from './services/return.service';
import { PendingReturnService } from './services/pending-return.service';
import { TransactionService } from './services/transaction.service';
import { ReportService } from './services/report.service';
import { AuthService } from './services/auth.service';
import { SlipRenderer } from './services/slip.service';
import {
  NotificationDispatcher,
  NotificationSender,
  ResendNotificationSender,
} from './services/notification.service';
import { ItemController } from './controllers/item.controller';
import { BorrowerController } from './controllers/borrower.controller';
import { BorrowController } from './controllers/borrow.controller';
import { ReturnController } from './controllers/return.controller';
import { TransactionController } from './controllers/transaction.controller';
import { ReportController } from './controllers/report.controller';
import { AuthController } from './controllers/auth.controller';
import type { OverReturnPolicy } from './types/return.types';

export interface Repositories {
  items: IItemRepository;
  borrowers: IBorrowerRepository;
  transactions: ITransactionRepository;
  pendingReturns: IPendingReturnRepository;
  admins: IAdminRepository;
}

export interface ContainerConfig {
  jwtSecret: string;
  jwtExpiresInSeconds: number;
  otpTtlMinutes: number;
  pendingReturnsEnabled: boolean;
  overReturnPolicy: OverReturnPolicy;
  dedupeWindowMs: number;
  institutionName: string;
  timeZone: string;
  notifyMaxAttempts: number;
  notifyRetryDelayMs: number;
  now?: () => Date;
}

export interface AppContainer {
  authService: AuthService;
  dispatcher: NotificationDispatcher;
  controllers: {
    items: ItemController;
    borrowers: BorrowerController;
    borrows: BorrowController;
    returns: ReturnController;
    transactions: TransactionController;
    reports: ReportController;
    auth: AuthController;
  };
}

export const createSupabaseRepositories = (client: SupabaseClient): Repositories => ({
  items: new ItemRepository(client),
  borrowers: new BorrowerRepository(client),
  transactions: new TransactionRepository(client),
  pendingReturns: new PendingReturnRepository(client),
  admins: new AdminRepository(client),
});

/**
 * Wire repositories, services and controllers together
 *
 * A null sender disables outgoing mail; login then fails with
 * NOTIFICATION_FAILED since the code cannot be delivered.
 */
export function createContainer(
  repos: Repositories,
  sender: NotificationSender | null,
  config: ContainerConfig
): AppContainer {
  const now = config.now ?? (() => new Date());

  const slipRenderer = new SlipRenderer({
    institutionName: config.institutionName,
    timeZone: config.timeZone,
  });
  const dispatcher = new NotificationDispatcher(sender, {
    maxAttempts: config.notifyMaxAttempts,
    retryDelayMs: config.notifyRetryDelayMs,
  });

  const itemService = new ItemService(repos.items);
  const borrowerService = new BorrowerService(repos.borrowers, repos.transactions);
  const borrowService = new BorrowService(
    repos.borrowers,
    repos.items,
    repos.transactions,
    dispatcher,
    slipRenderer,
    { dedupeWindowMs: config.dedupeWindowMs, now }
  );
  const returnService = new ReturnService(repos.borrowers, repos.transactions, dispatcher, slipRenderer, {
    overReturnPolicy: config.overReturnPolicy,
    now,
  });
  const pendingReturnService = new PendingReturnService(
    repos.pendingReturns,
    repos.borrowers,
    repos.transactions,
    returnService,
    { enabled: config.pendingReturnsEnabled }
  );
  const transactionService = new TransactionService(
    repos.transactions,
    repos.borrowers,
    repos.admins,
    slipRenderer
  );
  const reportService = new ReportService(repos.items, repos.transactions, slipRenderer, now);
  const authService = new AuthService(repos.admins, dispatcher, {
    jwtSecret: config.jwtSecret,
    jwtExpiresInSeconds: config.jwtExpiresInSeconds,
    otpTtlMinutes: config.otpTtlMinutes,
    now,
  });

  return {
    authService,
    dispatcher,
    controllers: {
      items: new ItemController(itemService),
      borrowers: new BorrowerController(borrowerService),
      borrows: new BorrowController(borrowService),
      returns: new ReturnController(returnService, pendingReturnService),
      transactions: new TransactionController(transactionService),
      reports: new ReportController(reportService),
      auth: new AuthController(authService),
    },
  };
}

/**
 * Sender for the configured environment, or null when mail is not set up
 */
export const createNotificationSender = (
  apiKey: string | undefined,
  from: string
): NotificationSender | null => (apiKey ? new ResendNotificationSender(apiKey, from) : null);
