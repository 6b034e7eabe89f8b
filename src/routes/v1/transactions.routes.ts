import { Router } from 'express';
import { TransactionController } from '../../controllers/transaction.controller';

/**
 * Transaction routes (v1)
 */
export function createTransactionsRouter(transactionController: TransactionController): Router {
  const router = Router();

  /**
   * @swagger
   * /v1/transactions:
   *   get:
   *     summary: Search borrowing history
   *     tags: [Transactions]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: query
   *         name: borrower_id
   *         schema:
   *           type: integer
   *       - in: query
   *         name: item_id
   *         schema:
   *           type: integer
   *       - in: query
   *         name: status
   *         schema:
   *           type: string
   *           enum: [borrowed, partial, returned]
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
   *       - in: query
   *         name: limit
   *         schema:
   *           type: integer
   *           default: 20
   *       - in: query
   *         name: offset
   *         schema:
   *           type: integer
   *           default: 0
   *     responses:
   *       200:
   *         description: Page of transactions, newest first
   */
  router.get('/', transactionController.listTransactions);

  /**
   * @swagger
   * /v1/transactions/{reference}:
   *   get:
   *     summary: Get a transaction by id or reference number
   *     tags: [Transactions]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: reference
   *         required: true
   *         schema:
   *           type: string
   *           example: '0000042'
   *     responses:
   *       200:
   *         description: Transaction
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/BorrowTransaction'
   *       404:
   *         description: Transaction not found
   * /v1/transactions/{reference}/slip:
   *   get:
   *     summary: Borrower's slip as PDF
   *     tags: [Transactions]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: reference
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: PDF document
   *         content:
   *           application/pdf: {}
   */
  router.get('/:reference', transactionController.getTransaction);
  router.get('/:reference/slip', transactionController.getSlip);

  return router;
}
