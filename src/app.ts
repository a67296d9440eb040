import express, { Express } from 'express';
import cors from 'cors';
import config from './config/index.js';
import { globalErrorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestLogger } from './middleware/requestLogger.js';
import { createChatRouter } from './routes/chatRoutes.js';
import { createHolidayRouter } from './routes/holidayRoutes.js';
import { createLookupRouter } from './routes/lookupRoutes.js';
import { createScheduleRouter } from './routes/scheduleRoutes.js';
import { AppContext } from './types/index.js';

export function createApp(ctx: AppContext): Express {
  const app = express();

  // Middleware
  app.set('trust proxy', 1);
  app.use(cors({ origin: config.clientUrl }));
  app.use(express.json());
  app.use(requestLogger);

  // Routes
  app.use('/api/chat', createChatRouter(ctx));
  app.use('/api', createLookupRouter(ctx));
  app.use('/api/schedule', createScheduleRouter(ctx));
  app.use('/api/holidays', createHolidayRouter(ctx));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(notFoundHandler);
  app.use(globalErrorHandler);

  return app;
}
