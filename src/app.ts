/**
 * Express Application Setup
 *
 * - Security (Helmet, CORS)
 * - Body parsing
 * - Request logging
 * - Rate limiting
 * - Routes
 * - Error handling
 */

import express, { Request, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { config } from './config/environment';
import { logger } from './config/logger';
import { pool } from './config/database';
import { errorHandler, notFoundHandler, asyncHandler } from './middleware/errorHandler.middleware';
import { apiRateLimiter } from './middleware/rateLimiter.middleware';
import { requestLogger, REQUEST_ID_HEADER } from './middleware/requestLogger.middleware';

import studyRoutes from './routes/study.routes';
import conceptRoutes from './routes/concept.routes';

const VERSION = '1.0.0';

const app = express();

// ============================================================================
// SECURITY MIDDLEWARE
// ============================================================================

app.use(helmet());

const corsOptions: cors.CorsOptions = {
  origin: (origin, callback) => {
    // Same-origin requests and tools like curl send no origin
    if (!origin || config.security.allowedOrigins.length === 0) {
      callback(null, true);
      return;
    }

    const isAllowed = config.security.allowedOrigins.some(allowed => {
      if (allowed.includes('*')) {
        const pattern = allowed
          .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
          .replace(/\*/g, '[^.]+');
        return new RegExp(`^${pattern}$`).test(origin);
      }
      return allowed === origin;
    });

    if (!isAllowed) {
      logger.warn('CORS blocked request', { origin });
    }
    callback(null, isAllowed);
  },
  methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Accept', REQUEST_ID_HEADER],
  exposedHeaders: [REQUEST_ID_HEADER, 'Content-Disposition']
};

app.use(cors(corsOptions));

// ============================================================================
// BODY PARSING
// ============================================================================

app.use(express.json({ limit: '10mb' }));

// ============================================================================
// REQUEST LOGGING
// ============================================================================

app.use(requestLogger);

// ============================================================================
// GENERAL RATE LIMITING
// ============================================================================

app.use('/api', apiRateLimiter);

// ============================================================================
// HEALTH CHECK
// ============================================================================

app.get('/health', (req: Request, res: Response) => {
  res.json({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    environment: config.server.env,
    version: VERSION
  });
});

app.get('/api/health', asyncHandler(async (req: Request, res: Response) => {
  let database = 'connected';
  try {
    await pool.query('SELECT 1');
  } catch (error) {
    logger.warn('Health check database probe failed', {
      error: error instanceof Error ? error.message : String(error)
    });
    database = 'unavailable';
  }

  res.status(database === 'connected' ? 200 : 503).json({
    status: database === 'connected' ? 'healthy' : 'degraded',
    timestamp: new Date().toISOString(),
    services: { database }
  });
}));

// ============================================================================
// API ROUTES
// ============================================================================

app.use('/api/studies', studyRoutes);
app.use('/api/concepts', conceptRoutes);

app.get('/', (req: Request, res: Response) => {
  res.json({
    name: 'SoA Versioning API',
    version: VERSION,
    health: '/health',
    endpoints: {
      studies: '/api/studies',
      freezes: '/api/studies/:studyId/freezes',
      audit: '/api/studies/:studyId/audit',
      concepts: '/api/concepts'
    }
  });
});

// ============================================================================
// ERROR HANDLING
// ============================================================================

app.use(notFoundHandler);
app.use(errorHandler);

export default app;
