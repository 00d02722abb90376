import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';

import gs1Routes from './routes/gs1';
import { getCatalog } from './gs1';
import { getRedis } from './config/redis';

// CORS origins configuration
export const getCorsOrigins = (): string[] => {
  const origins: string[] = [];

  // Production origin from environment variable
  if (process.env.FRONTEND_URL) {
    origins.push(process.env.FRONTEND_URL);
  }

  // Development origins (localhost only)
  if (process.env.NODE_ENV === 'development') {
    origins.push('http://localhost:5173');
    origins.push('http://localhost:8080');
  }

  return origins;
};

// CORS origin checker function
export const corsOriginChecker = (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
  // Allow requests with no origin (curl, scanner terminals, etc.)
  if (!origin) {
    return callback(null, true);
  }

  const isAllowed = getCorsOrigins().includes(origin);
  if (!isAllowed) {
    console.warn(`⚠️ CORS: Blocked request from origin: ${origin}`);
  }

  callback(null, isAllowed);
};

export const createApp = (): Express => {
  const app = express();

  app.use(cors({
    origin: (origin, callback) => corsOriginChecker(origin, callback),
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    optionsSuccessStatus: 204
  }));
  app.use(express.json({ limit: '1mb' }));

  // Request logging middleware (development only)
  if (process.env.NODE_ENV === 'development') {
    app.use((req: Request, _res: Response, next: NextFunction) => {
      console.log(`📨 ${req.method} ${req.path}`);
      next();
    });
  }

  app.use('/api/gs1', gs1Routes);

  // Health check endpoint
  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({
      status: 'OK',
      message: 'Server is running',
      cache: getRedis()?.status === 'ready' ? 'connected' : 'disabled',
      catalogSize: getCatalog().size,
      timestamp: new Date().toISOString()
    });
  });

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Endpoint not found' });
  });

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    // Malformed JSON bodies surface here from express.json()
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: 'Invalid JSON body' });
    }
    console.error('❌ Server error:', err);
    res.status(500).json({
      error: 'Internal server error',
      message: process.env.NODE_ENV === 'development' ? err.message : undefined
    });
  });

  return app;
};
