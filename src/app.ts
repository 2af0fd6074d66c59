import express from 'express';
import telegramRoutes from './routes/telegram.routes';
import sessionStore from './services/session.service';
import updateDispatcher from './handlers/update.dispatcher';

const app = express();

// Middleware
app.use(express.json());

// Routes
app.use('/', telegramRoutes);

// Root endpoint
app.get('/', (req, res) => {
  res.json({
    service: 'ScribeDesk Bot API',
    status: 'running',
    version: '1.0.0',
    endpoints: {
      health: '/health',
      telegram: {
        webhook: '/webhook (POST for updates)',
      },
    },
  });
});

// Health check endpoint with session and queue counts
app.get('/health', (req, res) => {
  res.json({
    status: 'ok',
    sessions: sessionStore.size,
    queuedUpdates: updateDispatcher.pending,
    timestamp: new Date().toISOString(),
  });
});

export default app;
