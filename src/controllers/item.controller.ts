import { Request, Response } from 'express';
import { ItemService } from '../services/item.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import {
  createItemSchema,
  itemIdSchema,
  listItemsSchema,
  updateItemSchema,
} from '../validators/item.validator';

/**
 * Item Controller
 *
 * HTTP request handlers for item endpoints
 */
export class ItemController {
  constructor(private itemService: ItemService) {}

  /**
   * POST /v1/items
   * Create a new item
   */
  createItem = asyncHandler(async (req: Request, res: Response) => {
    const { body } = await parseRequest(createItemSchema, req);

    const item = await this.itemService.createItem({
      name: body.name,
      category: body.category ?? null,
      totalQuantity: body.total_quantity,
    });

    res.status(201).json(createSuccessResponse(item));
  });

  /**
   * GET /v1/items
   * List the catalog (or the archive)
   */
  listItems = asyncHandler(async (req: Request, res: Response) => {
    const { query } = await parseRequest(listItemsSchema, req);

    const items = await this.itemService.listItems({
      archived: query.archived,
      ...(query.category && { category: query.category }),
    });

    res.status(200).json(createSuccessResponse(items));
  });

  /**
   * GET /v1/items/:id
   * Get item with availability
   */
  getItem = asyncHandler(async (req: Request, res: Response) => {
    const { params } = await parseRequest(itemIdSchema, req);

    const item = await this.itemService.getItem(params.id);

    res.status(200).json(createSuccessResponse(item));
  });

  /**
   * PATCH /v1/items/:id
   */
  updateItem = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = await parseRequest(updateItemSchema, req);

    const item = await this.itemService.updateItem(params.id, {
      ...(body.name !== undefined && { name: body.name }),
      ...(body.category !== undefined && { category: body.category }),
      ...(body.total_quantity !== undefined && { totalQuantity: body.total_quantity }),
    });

    res.status(200).json(createSuccessResponse(item, 'Item updated'));
  });

  /**
   * POST /v1/items/:id/archive
   */
  archiveItem = asyncHandler(async (req: Request, res: Response) => {
    const { params } = await parseRequest(itemIdSchema, req);

    const item = await this.itemService.archiveItem(params.id);

    res.status(200).json(createSuccessResponse(item, 'Item archived'));
  });

  /**
   * POST /v1/items/:id/restore
   */
  restoreItem = asyncHandler(async (req: Request, res: Response) => {
    const { params } = await parseRequest(itemIdSchema, req);

    const item = await this.itemService.restoreItem(params.id);

    res.status(200).json(createSuccessResponse(item, 'Item restored'));
  });
}
