import { z } from 'zod';
import { Request, Response, NextFunction } from 'express';

// --- Param schemas ---

export const toolNameParamSchema = z.object({
  name: z.string().regex(/^[a-z_]+$/, 'Tool name must be lowercase letters and underscores'),
});

// --- Body schemas ---

// Tool arguments are validated by the tool itself; here we only require an object
export const toolArgsBodySchema = z.record(z.unknown());

// --- Middleware ---

function issueList(error: z.ZodError) {
  return error.issues.map(i => ({
    path: i.path.join('.'),
    message: i.message,
  }));
}

/**
 * Validate request body against a Zod schema.
 */
export function validateBody(schema: z.ZodTypeAny) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body ?? {});
    if (!result.success) {
      return res.status(400).json({
        error: true,
        code: 'VALIDATION_ERROR',
        message: 'Invalid request body',
        details: issueList(result.error),
      });
    }
    req.body = result.data;
    next();
  };
}

/**
 * Validate request params against a Zod schema.
 */
export function validateParams(schema: z.ZodTypeAny) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.params);
    if (!result.success) {
      return res.status(400).json({
        error: true,
        code: 'VALIDATION_ERROR',
        message: 'Invalid URL parameters',
        details: issueList(result.error),
      });
    }
    next();
  };
}
