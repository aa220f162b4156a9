/**
 * =============================================================================
 * MESSAGE MODULE - ROUTES
 * =============================================================================
 *
 * - loadMessagesRouter, mounted at /loads/:id/messages (thread, send)
 * - messageRouter, mounted at /messages (inbox)
 * =============================================================================
 */

import { Router, Request, Response, NextFunction } from 'express';
import { authMiddleware, getActor } from '../../shared/middleware/auth.middleware';
import { messageRateLimiter } from '../../shared/middleware/rate-limiter.middleware';
import { successResponse } from '../../shared/types/api.types';
import { validateSchema } from '../../shared/utils/validation.utils';
import { MessageRecord } from '../../shared/database/db';
import { messagingChannel } from './message.channel';
import { sendMessageSchema, threadQuerySchema } from './message.schema';

const loadMessagesRouter = Router({ mergeParams: true });
const messageRouter = Router();

/**
 * Take one page out of a lazy thread without materializing the rest
 */
function pageOf(thread: Iterable<MessageRecord>, page: number, limit: number): {
  items: MessageRecord[];
  hasMore: boolean;
} {
  const start = (page - 1) * limit;
  const items: MessageRecord[] = [];
  let index = 0;

  for (const message of thread) {
    if (index >= start + limit) {
      return { items, hasMore: true };
    }
    if (index >= start) {
      items.push(message);
    }
    index++;
  }
  return { items, hasMore: false };
}

/**
 * @route   GET /loads/:id/messages
 * @desc    Conversation on a load, oldest first
 * @access  Parties to the load, Admin
 */
loadMessagesRouter.get('/', authMiddleware, (req: Request, res: Response, next: NextFunction) => {
  try {
    const { page, limit } = validateSchema(threadQuerySchema, req.query, 'Invalid query parameters');
    const thread = messagingChannel.thread(String(req.params.id), getActor(req));
    const { items, hasMore } = pageOf(thread, page, limit);

    res.json(successResponse(items, { page, limit, hasMore }));
  } catch (error) {
    next(error);
  }
});

/**
 * @route   POST /loads/:id/messages
 * @desc    Send a message to another party on the load
 * @access  Parties to the load, Admin
 */
loadMessagesRouter.post(
  '/',
  authMiddleware,
  messageRateLimiter,
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { recipientId, body } = validateSchema(sendMessageSchema, req.body, 'Invalid message');
      const message = await messagingChannel.send(String(req.params.id), getActor(req), recipientId, body);
      res.status(201).json(successResponse(message));
    } catch (error) {
      next(error);
    }
  }
);

/**
 * @route   GET /messages/inbox
 * @desc    Messages received across all loads, newest first
 * @access  Authenticated
 */
messageRouter.get('/inbox', authMiddleware, (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(successResponse(messagingChannel.inbox(getActor(req))));
  } catch (error) {
    next(error);
  }
});

export { loadMessagesRouter, messageRouter };
