import { Router } from 'express';
import logger from '../config/logger';
import telegramController from '../controllers/telegram.controller';
import { describeError } from '../utils/AppError';

const router = Router();

/**
 * Telegram webhook endpoint
 * POST /webhook - Incoming messages and button presses
 */
router.post('/webhook', async (req, res) => {
  try {
    await telegramController.receiveWebhook(req, res);
  } catch (error) {
    logger.error('Unhandled webhook receive error:', { error: describeError(error) });
    // Fallback error handler - only send if response hasn't been sent
    if (!res.headersSent) {
      res.status(500).send('Internal error');
    }
  }
});

export default router;
