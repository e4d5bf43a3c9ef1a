import { Router, Request, Response } from 'express';
import { MailboxTools } from '../application/tools/MailboxTools';
import { AppError } from '../domain/common/Errors';
import { ILogger } from '../domain/common/ILogger';
import {
  validateBody,
  validateParams,
  toolArgsBodySchema,
  toolNameParamSchema,
} from './validation';

interface ToolRouteDependencies {
  mailboxTools: MailboxTools;
  logger: ILogger;
}

export function createToolRoutes(deps: ToolRouteDependencies) {
  const { mailboxTools, logger } = deps;
  const router = Router();

  const handleError = (err: unknown, res: Response) => {
    if (err instanceof AppError) {
      return res.status(err.statusCode).json(err.toJSON());
    }
    const error = err instanceof Error ? err : new Error(String(err));
    logger.error('Tool call failed:', error);
    return res.status(500).json({
      error: true,
      message: error.message,
      code: 'INTERNAL_ERROR',
    });
  };

  // GET /api/tools — Tool catalog
  router.get('/tools', (req: Request, res: Response) => {
    res.json({ tools: mailboxTools.catalog() });
  });

  // POST /api/tools/:name — Invoke a tool with the JSON body as arguments
  router.post(
    '/tools/:name',
    validateParams(toolNameParamSchema),
    validateBody(toolArgsBodySchema),
    async (req: Request, res: Response) => {
      try {
        const result = await mailboxTools.invoke(req.params.name, req.body);
        res.json(result);
      } catch (err) {
        handleError(err, res);
      }
    }
  );

  // GET /api/folders — Folder summary
  router.get('/folders', async (req: Request, res: Response) => {
    try {
      res.json(await mailboxTools.getFolderSummary());
    } catch (err) {
      handleError(err, res);
    }
  });

  return router;
}
