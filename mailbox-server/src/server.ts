import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import http from 'http';
import { WebSocketServer } from 'ws';
import { createContainer, Container } from './container';
import { createToolRoutes } from './api/toolRoutes';
import { WebSocketBridge } from './infrastructure/websocket/WebSocketBridge';
import { AppError } from './domain/common/Errors';

/**
 * Build the express app over a wired container. Does not listen.
 */
export function createApp(container: Container, getBridge: () => WebSocketBridge | undefined = () => undefined) {
  const { config, logger, mailboxTools } = container;
  const app = express();

  if (config.cors.enabled) {
    app.use(cors({
      origin: config.cors.origins.includes('*') ? true : config.cors.origins,
      credentials: config.cors.credentials,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
    }));
  }
  app.use(express.json());

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: Date.now(),
      uptime: process.uptime()
    });
  });

  app.get('/ws-status', (req: Request, res: Response) => {
    const bridge = getBridge();
    if (!bridge) {
      return res.json({
        error: 'WebSocket server not initialized yet'
      });
    }
    res.json({
      connectedClients: bridge.getClientCount(),
      clients: bridge.getClientStatus()
    });
  });

  app.use('/api', createToolRoutes({ mailboxTools, logger }));

  // Global error handling middleware
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    logger.error('Server error:', err);

    if (err instanceof AppError) {
      return res.status(err.statusCode).json(err.toJSON());
    }

    res.status(500).json({
      error: true,
      message: err.message,
      code: 'INTERNAL_ERROR'
    });
  });

  return app;
}

export async function startServer() {
  const container = createContainer();
  await container.initialize();

  const { config, logger, eventBus } = container;
  logger.debug(config.toString());

  let wsBridge: WebSocketBridge | undefined;
  const app = createApp(container, () => wsBridge);

  const server = http.createServer(app);
  const wss = new WebSocketServer({ server });
  wsBridge = new WebSocketBridge(wss, eventBus, logger);

  await new Promise<void>((resolve) => {
    server.listen(config.port, config.host, () => resolve());
  });
  logger.info(`Mailbox server listening on ${config.serverUrl}`);

  // Graceful shutdown
  let isShuttingDown = false;
  process.on('SIGINT', () => {
    if (isShuttingDown) {
      process.exit(1);
    }
    isShuttingDown = true;

    const forceExitTimeout = setTimeout(() => {
      process.exit(1);
    }, 5000);

    wss.clients.forEach(client => {
      client.close();
    });
    wss.close();

    container.shutdown()
      .then(() => {
        server.close(() => {
          clearTimeout(forceExitTimeout);
          process.exit(0);
        });
      })
      .catch((err: unknown) => {
        logger.error('Shutdown failed:', err instanceof Error ? err : new Error(String(err)));
        clearTimeout(forceExitTimeout);
        process.exit(1);
      });
  });

  return { app, server, container };
}

if (require.main === module) {
  startServer().catch((err: unknown) => {
    console.error('Failed to start mailbox server:', err);
    process.exit(1);
  });
}
