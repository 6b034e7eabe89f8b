import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Async handler wrapper
 *
 * Wraps async route handlers and passes rejections to the Express error middleware
 *
 * Usage:
 * ```typescript
 * router.post('/borrows', asyncHandler(async (req, res) => {
 *   const outcome = await borrowService.issue(input, req.staff);
 *   res.status(201).json(createSuccessResponse(outcome));
 * }));
 * ```
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
};
