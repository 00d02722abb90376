import { Server as SocketIOServer, Socket } from 'socket.io';
import { getDecoderDefaults } from '../config/decoder';
import { Gs1OptionsError, parseGs1, resolveRequestOptions } from '../gs1';
import type { ParseResult } from '../gs1';

export type ScanParseResponse =
  | { success: true; result: ParseResult }
  | { success: false; error: string };

type ScanAck = (response: ScanParseResponse) => void;

/**
 * Decode a `scan:parse` payload: either the raw barcode string or
 * `{ barcode, options }`.
 */
export const handleScanParse = (payload: unknown): ScanParseResponse => {
  let barcode: unknown = payload;
  let rawOptions: unknown;
  if (typeof payload === 'object' && payload !== null && 'barcode' in payload) {
    barcode = payload.barcode;
    rawOptions = 'options' in payload ? payload.options : undefined;
  }
  if (typeof barcode !== 'string') {
    return { success: false, error: 'barcode (string) is required' };
  }

  try {
    const options = resolveRequestOptions(rawOptions, getDecoderDefaults());
    return { success: true, result: parseGs1(barcode, options) };
  } catch (error) {
    if (error instanceof Gs1OptionsError) {
      return { success: false, error: error.message };
    }
    console.error('❌ Socket scan:parse error:', error);
    return { success: false, error: 'Failed to parse barcode' };
  }
};

/**
 * Setup WebSocket handlers for live scanner stations
 */
export const setupSocketHandlers = (io: SocketIOServer) => {
  io.on('connection', (socket: Socket) => {
    const station = typeof socket.handshake.auth?.station === 'string' ? socket.handshake.auth.station : 'anonymous';
    console.log(`🔌 Socket connected: ${socket.id} (${station})`);

    // Decode a scan and share it with the other stations
    socket.on('scan:parse', (payload: unknown, ack?: ScanAck) => {
      const response = handleScanParse(payload);
      if (typeof ack === 'function') {
        ack(response);
      }
      if (response.success) {
        socket.broadcast.emit('scan:decoded', {
          station,
          elements: response.result.elements,
          confidence: response.result.confidence,
          timestamp: Date.now()
        });
      }
    });

    // Ping/pong for connection health
    socket.on('ping', () => {
      socket.emit('pong', { timestamp: Date.now() });
    });

    socket.on('disconnect', (reason) => {
      console.log(`🔌 Socket disconnected: ${socket.id} (${station}) - ${reason}`);
    });

    socket.on('error', (error) => {
      console.error(`❌ Socket error for ${socket.id}:`, error);
    });
  });

  console.log('🔌 WebSocket handlers initialized');
};
