import { Router } from 'express';
import { createChatController } from '../controllers/chatController.js';
import { validateChat } from '../middleware/chatValidation.js';
import { createLookupRateLimiter } from '../middleware/rateLimiter.js';
import { AppContext } from '../types/index.js';

export function createChatRouter(ctx: AppContext): Router {
  const router = Router();

  // Every chat event may hit the geocoder and the FeatureServer
  router.post('/', createLookupRateLimiter(), validateChat, createChatController(ctx));

  return router;
}
