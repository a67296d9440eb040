import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ErrorCode } from '../utils/AppError.js';

/* ------------------------------------------------------------------ */
/*  Validation middleware factory                                     */
/* ------------------------------------------------------------------ */

/**
 * Validate `req.body` against a zod schema and replace it with the parsed
 * value, so handlers downstream see trimmed, typed input.
 */
export function validate(schema: z.ZodTypeAny) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      const messages = result.error.issues.map(
        (i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message),
      );
      res.status(400).json({
        success: false,
        message: 'Validation failed',
        code: ErrorCode.VALIDATION_ERROR,
        errors: messages,
      });
      return;
    }
    req.body = result.data;
    next();
  };
}
