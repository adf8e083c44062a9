import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { WebSocketServer } from 'ws';
import { createContainer, Container } from './container';
import { createConversationRoutes } from './api/conversationRoutes';
import { createEngagementRoutes } from './api/engagementRoutes';
import { createLearnerRoutes } from './api/learnerRoutes';
import { createCatalogRoutes } from './api/catalogRoutes';
import { WebSocketBridge } from './infrastructure/websocket/WebSocketBridge';
import { handleError } from './api/errors';

/**
 * Build the Express application for a wired container.
 * `bridge` reports WebSocket status once the socket server is attached.
 */
export function createApp(container: Container, bridge: () => WebSocketBridge | undefined = () => undefined): Express {
  const { config, logger, orchestrator, engagementService, preferenceService, catalogService, assignmentService } = container;

  // Create Express app
  const app = express();

  // Middleware - CORS configuration for the channel gateway and admin dashboards
  if (config.cors.enabled) {
    app.use(cors({
      origin: config.cors.origins.includes('*') ? true : config.cors.origins,
      credentials: config.cors.credentials,
      methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With']
    }));
  }
  app.use(express.json());

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: container.clock(),
      uptime: process.uptime()
    });
  });

  // WebSocket status endpoint
  app.get('/ws-status', (req: Request, res: Response) => {
    const wsBridge = bridge();
    if (!wsBridge) {
      return res.json({
        error: 'WebSocket server not initialized yet'
      });
    }
    res.json({
      connectedClients: wsBridge.getClientCount(),
      clients: wsBridge.getClientStatus()
    });
  });

  // API routes using services
  app.use('/api', createConversationRoutes(orchestrator));
  app.use('/api', createEngagementRoutes(engagementService, config.conversation.postponeDefaultDays, container.clock));
  app.use('/api', createLearnerRoutes({
    preferences: preferenceService,
    catalog: catalogService,
    assignments: assignmentService
  }));
  app.use('/api', createCatalogRoutes(catalogService));

  // Global error handling middleware
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error('Server error:', err);
    handleError(err, res);
  });

  return app;
}

export async function startServer() {
  // Create and initialize dependency container
  const container = await createContainer();
  await container.initialize();

  const { config, logger, eventBus } = container;
  logger.info(config.toString());

  let wsBridge: WebSocketBridge | undefined;
  const app = createApp(container, () => wsBridge);

  // Start HTTP server
  const server = app.listen(config.port, config.host, () => {
    logger.info(`Server listening on http://${config.host}:${config.port}`);
  });

  // Start WebSocket server with event bus bridge
  const wss = new WebSocketServer({ server });
  wsBridge = new WebSocketBridge(wss, eventBus, logger);

  // Graceful shutdown
  let isShuttingDown = false;
  process.on('SIGINT', async () => {
    if (isShuttingDown) {
      process.exit(1);
    }

    isShuttingDown = true;

    const forceExitTimeout = setTimeout(() => {
      process.exit(1);
    }, 5000);

    try {
      // Close WebSocket connections
      wss.clients.forEach(client => {
        client.close();
      });

      wss.close();

      // Shutdown container (cleans up event bus)
      await container.shutdown();

      // Close HTTP server
      server.close(() => {
        clearTimeout(forceExitTimeout);
        process.exit(0);
      });
    } catch (err) {
      logger.error('Shutdown failed:', err instanceof Error ? err : new Error(String(err)));
      clearTimeout(forceExitTimeout);
      process.exit(1);
    }
  });

  return { app, server, container };
}

// Start server
if (require.main === module) {
  startServer().catch(err => {
    console.error('Failed to start server:', err);
    process.exit(1);
  });
}
