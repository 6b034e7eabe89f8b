import { Router } from 'express';
import { ReportController } from '../../controllers/report.controller';

/**
 * Report routes (v1)
 */
export function createReportsRouter(reportController: ReportController): Router {
  const router = Router();

  /**
   * @swagger
   * /v1/reports/usage:
   *   get:
   *     summary: Usage summary for a date range
   *     tags: [Reports]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: query
   *         name: from
   *         schema:
   *           type: string
   *           format: date-time
   *       - in: query
   *         name: to
   *         schema:
   *           type: string
   *           format: date-time
   *     responses:
   *       200:
   *         description: Usage report
   *       400:
   *         description: Range start is after its end
   * /v1/reports/usage.pdf:
   *   get:
   *     summary: Usage summary rendered as PDF
   *     tags: [Reports]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: query
   *         name: from
   *         schema:
   *           type: string
   *           format: date-time
   *       - in: query
   *         name: to
   *         schema:
   *           type: string
   *           format: date-time
   *     responses:
   *       200:
   *         description: PDF document
   *         content:
   *           application/pdf: {}
   */
  router.get('/usage', reportController.getSummary);
  router.get('/usage.pdf', reportController.getSummaryPdf);

  return router;
}
