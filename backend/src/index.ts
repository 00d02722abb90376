import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import dotenv from 'dotenv';
import path from 'path';

// Load environment variables
dotenv.config({ path: path.join(__dirname, '..', '.env') });

import { createApp, corsOriginChecker } from './app';
import { getCatalog } from './gs1';
import { getDecoderDefaults } from './config/decoder';
import { closeRedis, initRedis } from './config/redis';
import { setupSocketHandlers } from './websocket/socketHandler';

const app = createApp();
const httpServer = createServer(app);

const io = new SocketIOServer(httpServer, {
  cors: {
    origin: (origin, callback) => corsOriginChecker(origin, callback),
    methods: ['GET', 'POST'],
    credentials: true
  }
});

const PORT: number = Number(process.env.PORT) || 3001;

// Setup WebSocket handlers
setupSocketHandlers(io);

// Start server
const startServer = () => {
  try {
    // Fail fast on a broken AI table or bad GS1_* settings
    const catalog = getCatalog();
    const defaults = getDecoderDefaults();
    const redis = initRedis();

    httpServer.listen({
      port: PORT,
      host: '0.0.0.0'
    }, () => {
      console.log('');
      console.log('🚀 ==========================================');
      console.log('🚀 GS1 Scan Decoder');
      console.log('🚀 ==========================================');
      console.log(`📡 Server:          http://localhost:${PORT}`);
      console.log(`📡 Health:          http://localhost:${PORT}/api/health`);
      console.log(`📡 Parse:           POST http://localhost:${PORT}/api/gs1/parse`);
      console.log(`🔌 WebSocket:       ws://localhost:${PORT}`);
      console.log(`📚 AI catalog:      ${catalog.size} AIs (${catalog.skippedRows} rows skipped)`);
      console.log(`⚙️  Decoder:         strict=${defaults.strictMode} pivot=${defaults.centuryPivot} beam=${defaults.beamWidth}`);
      console.log(`📦 Cache:           ${redis ? 'Redis' : 'disabled'}`);
      console.log('🚀 ==========================================');
      console.log('');
    });
  } catch (error) {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
  }
};

// Graceful shutdown
let isShuttingDown = false;
const shutdown = (signal: string) => {
  if (isShuttingDown) return;
  isShuttingDown = true;
  console.log(`🛑 ${signal} received. Shutting down gracefully...`);

  // Closes the socket server and the HTTP server under it
  io.close(async () => {
    console.log('✅ Server closed');
    try {
      await closeRedis();
    } catch (e) {
      console.warn('⚠️ Failed to close Redis connection cleanly:', e);
    } finally {
      process.exit(0);
    }
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

startServer();

export { io };
