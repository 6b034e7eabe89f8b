import { Router } from 'express';
import { BorrowController } from '../../controllers/borrow.controller';

/**
 * Borrow routes (v1)
 */
export function createBorrowsRouter(borrowController: BorrowController): Router {
  const router = Router();

  /**
   * @swagger
   * /v1/borrows:
   *   post:
   *     summary: Issue equipment to a borrower
   *     description: |
   *       All lines are issued or none. Item rows are locked while stock is
   *       checked, so concurrent issues never take more than is available.
   *       Repeating the same scan within the dedupe window returns the lines
   *       already recorded (200, replayed true).
   *     tags: [Borrows]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [borrower_rfid, instructor_rfid, subject, room, items]
   *             properties:
   *               borrower_rfid:
   *                 type: string
   *               instructor_rfid:
   *                 type: string
   *               subject:
   *                 type: string
   *               room:
   *                 type: string
   *               items:
   *                 type: array
   *                 items:
   *                   type: object
   *                   required: [item_id, quantity]
   *                   properties:
   *                     item_id:
   *                       type: integer
   *                     quantity:
   *                       type: integer
   *                       minimum: 1
   *                     condition_before:
   *                       type: string
   *     responses:
   *       201:
   *         description: Borrow issued
   *       200:
   *         description: Duplicate scan replayed
   *       409:
   *         description: Insufficient stock, archived item, or a rescan with a different quantity
   *       422:
   *         description: Authorizing badge is not an instructor
   */
  router.post('/', borrowController.issueBorrow);

  return router;
}
