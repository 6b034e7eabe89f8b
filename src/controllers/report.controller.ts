import { Request, Response } from 'express';
import { ReportService } from '../services/report.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import { reportRangeSchema } from '../validators/report.validator';

/**
 * Report Controller
 */
export class ReportController {
  constructor(private reportService: ReportService) {}

  /**
   * GET /v1/reports/usage
   */
  getSummary = asyncHandler(async (req: Request, res: Response) => {
    const { query } = await parseRequest(reportRangeSchema, req);

    const report = await this.reportService.getUsageReport({
      ...(query.from && { from: query.from }),
      ...(query.to && { to: query.to }),
    });

    res.status(200).json(createSuccessResponse(report));
  });

  /**
   * GET /v1/reports/usage.pdf
   */
  getSummaryPdf = asyncHandler(async (req: Request, res: Response) => {
    const { query } = await parseRequest(reportRangeSchema, req);

    const pdf = await this.reportService.getUsageReportPdf({
      ...(query.from && { from: query.from }),
      ...(query.to && { to: query.to }),
    });

    res
      .status(200)
      .type('application/pdf')
      .setHeader('Content-Disposition', 'inline; filename="usage-report.pdf"')
      .send(pdf);
  });
}
