import { Router } from 'express';
import { ItemController } from '../../controllers/item.controller';

/**
 * Item routes (v1)
 */
export function createItemsRouter(itemController: ItemController): Router {
  const router = Router();

  /**
   * @swagger
   * /v1/items:
   *   post:
   *     summary: Add equipment to the catalog
   *     tags: [Items]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - name
   *               - total_quantity
   *             properties:
   *               name:
   *                 type: string
   *               category:
   *                 type: string
   *               total_quantity:
   *                 type: integer
   *                 minimum: 0
   *     responses:
   *       201:
   *         description: Item created successfully
   *       409:
   *         description: An item with this name already exists
   *   get:
   *     summary: List the catalog
   *     tags: [Items]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: query
   *         name: category
   *         schema:
   *           type: string
   *       - in: query
   *         name: archived
   *         schema:
   *           type: string
   *           enum: ['true', 'false']
   *     responses:
   *       200:
   *         description: Items
   */
  router.post('/', itemController.createItem);
  router.get('/', itemController.listItems);

  /**
   * @swagger
   * /v1/items/{id}:
   *   get:
   *     summary: Get item with availability
   *     tags: [Items]
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
   *         description: Item retrieved successfully
   *       404:
   *         description: Item not found
   *   patch:
   *     summary: Update name, category or total quantity
   *     tags: [Items]
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
   *         description: Item updated
   *       409:
   *         description: Total quantity below the borrowed count
   */
  router.get('/:id', itemController.getItem);
  router.patch('/:id', itemController.updateItem);

  /**
   * @swagger
   * /v1/items/{id}/archive:
   *   post:
   *     summary: Archive an item with nothing borrowed
   *     tags: [Items]
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
   *         description: Item archived
   *       409:
   *         description: Units are still borrowed
   * /v1/items/{id}/restore:
   *   post:
   *     summary: Bring an archived item back to the catalog
   *     tags: [Items]
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
   *         description: Item restored
   */
  router.post('/:id/archive', itemController.archiveItem);
  router.post('/:id/restore', itemController.restoreItem);

  return router;
}
