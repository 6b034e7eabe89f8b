import { Router } from 'express';
import { BorrowerController } from '../../controllers/borrower.controller';

/**
 * Borrower routes (v1)
 */
export function createBorrowersRouter(borrowerController: BorrowerController): Router {
  const router = Router();

  /**
   * @swagger
   * /v1/borrowers:
   *   post:
   *     summary: Register a borrower badge
   *     tags: [Borrowers]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [rfid, borrower_code, first_name, last_name, role]
   *             properties:
   *               rfid:
   *                 type: string
   *               borrower_code:
   *                 type: string
   *               first_name:
   *                 type: string
   *               last_name:
   *                 type: string
   *               department:
   *                 type: string
   *               course:
   *                 type: string
   *               role:
   *                 type: string
   *                 enum: [student, instructor, staff]
   *               email:
   *                 type: string
   *     responses:
   *       201:
   *         description: Borrower registered
   *   get:
   *     summary: List borrowers
   *     tags: [Borrowers]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: query
   *         name: role
   *         schema:
   *           type: string
   *           enum: [student, instructor, staff]
   *       - in: query
   *         name: search
   *         schema:
   *           type: string
   *       - in: query
   *         name: archived
   *         schema:
   *           type: string
   *           enum: ['true', 'false']
   *     responses:
   *       200:
   *         description: Borrowers
   */
  router.post('/', borrowerController.createBorrower);
  router.get('/', borrowerController.listBorrowers);

  /**
   * @swagger
   * /v1/borrowers/rfid/{rfid}:
   *   get:
   *     summary: Look up an active borrower by badge
   *     tags: [Borrowers]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: rfid
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Borrower
   *       404:
   *         description: No active borrower with this badge
   */
  router.get('/rfid/:rfid', borrowerController.getBorrowerByRfid);

  /**
   * @swagger
   * /v1/borrowers/{id}:
   *   get:
   *     summary: Get a borrower
   *     tags: [Borrowers]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Borrower
   *   patch:
   *     summary: Update a borrower
   *     tags: [Borrowers]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Borrower updated
   */
  router.get('/:id', borrowerController.getBorrower);
  router.patch('/:id', borrowerController.updateBorrower);

  /**
   * @swagger
   * /v1/borrowers/{id}/archive:
   *   post:
   *     summary: Archive a borrower with nothing outstanding
   *     tags: [Borrowers]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Borrower archived
   *       409:
   *         description: Borrower still holds items
   * /v1/borrowers/{id}/restore:
   *   post:
   *     summary: Restore an archived borrower
   *     tags: [Borrowers]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Borrower restored
   */
  router.post('/:id/archive', borrowerController.archiveBorrower);
  router.post('/:id/restore', borrowerController.restoreBorrower);

  /**
   * @swagger
   * /v1/borrowers/{id}/transactions:
   *   get:
   *     summary: Borrowing history of one borrower
   *     tags: [Borrowers]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *       - in: query
   *         name: limit
   *         schema:
   *           type: integer
   *       - in: query
   *         name: offset
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Page of transactions
   * /v1/borrowers/{id}/open-items:
   *   get:
   *     summary: Items the borrower still holds, grouped by item
   *     tags: [Borrowers]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Outstanding items
   */
  router.get('/:id/transactions', borrowerController.listTransactions);
  router.get('/:id/open-items', borrowerController.listOpenItems);

  return router;
}
