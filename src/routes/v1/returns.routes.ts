import { Router } from 'express';
import { ReturnController } from '../../controllers/return.controller';

/**
 * Return routes (v1)
 *
 * @swagger
 * components:
 *   schemas:
 *     ReturnClaim:
 *       type: object
 *       required: [item_name, quantity]
 *       properties:
 *         item_name:
 *           type: string
 *         quantity:
 *           description: Positive whole number. Anything else is skipped and listed in the receipt.
 *           oneOf:
 *             - type: integer
 *             - type: string
 *         condition:
 *           type: string
 */
export function createReturnsRouter(returnController: ReturnController): Router {
  const router = Router();

  /**
   * @swagger
   * /v1/returns:
   *   post:
   *     summary: Record a return at the desk
   *     description: |
   *       Returned quantities are credited first-in-first-out against the
   *       borrower's open transactions for each item name. The whole
   *       submission commits or nothing does.
   *     tags: [Returns]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [borrower_id, items]
   *             properties:
   *               borrower_id:
   *                 type: integer
   *               items:
   *                 type: array
   *                 items:
   *                   $ref: '#/components/schemas/ReturnClaim'
   *     responses:
   *       200:
   *         description: Return receipt
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/ReturnReceipt'
   *       409:
   *         description: Over-return rejected, or a concurrent return changed the balances
   *       422:
   *         description: Nothing in the submission could be credited
   */
  router.post('/', returnController.submitReturn);

  return router;
}

/**
 * Kiosk routes (v1)
 */
export function createKioskRouter(returnController: ReturnController): Router {
  const router = Router();

  /**
   * @swagger
   * /v1/kiosk/returns:
   *   post:
   *     summary: Self-service return by badge
   *     description: |
   *       With staging enabled the claim is stored for staff approval (202).
   *       Otherwise it is reconciled immediately (200).
   *     tags: [Returns]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [borrower_rfid, items]
   *             properties:
   *               borrower_rfid:
   *                 type: string
   *               items:
   *                 type: array
   *                 items:
   *                   $ref: '#/components/schemas/ReturnClaim'
   *     responses:
   *       202:
   *         description: Return staged for approval
   *       200:
   *         description: Return applied
   */
  router.post('/returns', returnController.submitKioskReturn);

  return router;
}

/**
 * Pending return routes (v1)
 */
export function createPendingReturnsRouter(returnController: ReturnController): Router {
  const router = Router();

  /**
   * @swagger
   * /v1/pending-returns:
   *   get:
   *     summary: Staged returns awaiting a decision, oldest first
   *     tags: [Pending Returns]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Pending returns
   * /v1/pending-returns/{id}:
   *   get:
   *     summary: Get a staged return
   *     tags: [Pending Returns]
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
   *         description: Pending return
   *       404:
   *         description: Not found or already decided
   */
  router.get('/', returnController.listPendingReturns);
  router.get('/:id', returnController.getPendingReturn);

  /**
   * @swagger
   * /v1/pending-returns/{id}/approve:
   *   post:
   *     summary: Apply a staged return
   *     tags: [Pending Returns]
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
   *         description: Return applied, receipt included
   *       404:
   *         description: Not found or already decided
   * /v1/pending-returns/{id}/decline:
   *   post:
   *     summary: Discard a staged return
   *     tags: [Pending Returns]
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
   *         description: Return declined
   *       404:
   *         description: Not found or already decided
   */
  router.post('/:id/approve', returnController.approvePendingReturn);
  router.post('/:id/decline', returnController.declinePendingReturn);

  return router;
}
