import type { IItemRepository, ITransactionRepository } from '../repositories/interfaces';
import type { ReportRange, UsageReport } from '../types/report.types';
import { AppError, ErrorCode } from '../types/error.types';
import { buildUsageReport } from './report-builder';
import { SlipRenderer } from './slip.service';
import { logger } from '../config/logger';

/**
 * Report Service
 */
export class ReportService {
  constructor(
    private itemRepo: IItemRepository,
    private transactionRepo: ITransactionRepository,
    private slipRenderer: SlipRenderer,
    private now: () => Date = () => new Date()
  ) {}

  async getUsageReport(range: ReportRange): Promise<UsageReport> {
    if (range.from && range.to && range.from > range.to) {
      throw new AppError(ErrorCode.INVALID_INPUT, '"from" must not be after "to"', 400, {
        from: range.from,
        to: range.to,
      });
    }

    logger.debug('Building usage report', { range });

    const [items, borrowedInRange, open, returned] = await Promise.all([
      this.itemRepo.list({ archived: false }),
      this.transactionRepo.findBorrowedInRange(range),
      this.transactionRepo.findOpen(),
      this.transactionRepo.findReturned(),
    ]);

    return buildUsageReport({ range, items, borrowedInRange, open, returned, generatedAt: this.now() });
  }

  async getUsageReportPdf(range: ReportRange): Promise<Buffer> {
    const report = await this.getUsageReport(range);
    return this.slipRenderer.renderUsageReport(report);
  }
}
