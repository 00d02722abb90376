import { createServer } from 'http';
import type { AddressInfo } from 'net';
import { Server as SocketIOServer } from 'socket.io';
import { io as connect, type Socket as ClientSocket } from 'socket.io-client';
import { afterAll, beforeAll, describe, it, expect, vi } from 'vitest';
import { handleScanParse, setupSocketHandlers } from './socketHandler';

const A = '01062867400002491728043010GB2C2171490437969853';

describe('handleScanParse', () => {
  it('should decode a bare barcode string', () => {
    expect(handleScanParse(A)).toMatchObject({ success: true, result: { strategy: 'no-separator' } });
  });

  it('should accept options alongside the barcode', () => {
    expect(handleScanParse({ barcode: '0106285096', options: { strictMode: true } })).toMatchObject({
      success: true,
      result: { elements: [], confidence: 0 },
    });
  });

  it('should refuse payloads without a barcode', () => {
    expect(handleScanParse(42)).toEqual({ success: false, error: 'barcode (string) is required' });
    expect(handleScanParse({ barcode: 42 })).toEqual({ success: false, error: 'barcode (string) is required' });
  });

  it('should not let a client widen the beam', () => {
    expect(handleScanParse({ barcode: A, options: { beamWidth: 1000 } })).toEqual({
      success: false,
      error: 'beamWidth cannot exceed the server setting of 200',
    });
  });

  it('should report bad options', () => {
    expect(handleScanParse({ barcode: A, options: { beamWidth: 0 } })).toEqual({
      success: false,
      error: 'beamWidth must be an integer between 1 and 1000',
    });
  });
});

describe('setupSocketHandlers', () => {
  let io: SocketIOServer;
  let url: string;
  const clients: ClientSocket[] = [];

  const open = async (station: string): Promise<ClientSocket> => {
    const client = connect(url, { transports: ['websocket'], auth: { station } });
    clients.push(client);
    await new Promise<void>((resolve) => client.once('connect', () => resolve()));
    return client;
  };

  beforeAll(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const httpServer = createServer();
    io = new SocketIOServer(httpServer);
    setupSocketHandlers(io);
    await new Promise<void>((resolve) => httpServer.listen(0, () => resolve()));
    const address: AddressInfo | string | null = httpServer.address();
    if (!address || typeof address === 'string') throw new Error('Server has no TCP address');
    url = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    for (const client of clients) client.disconnect();
    await new Promise<void>((resolve) => io.close(() => resolve()));
    vi.restoreAllMocks();
  });

  it('should acknowledge scan:parse and broadcast the decode', async () => {
    const scanner = await open('dock-1');
    const watcher = await open('dock-2');
    const broadcast = new Promise<unknown>((resolve) => watcher.once('scan:decoded', resolve));

    const response: unknown = await scanner.emitWithAck('scan:parse', A);
    expect(response).toMatchObject({ success: true, result: { strategy: 'no-separator' } });
    expect(await broadcast).toMatchObject({
      station: 'dock-1',
      confidence: 0.8252,
      elements: [{ ai: '01' }, { ai: '17' }, { ai: '10' }, { ai: '21' }],
    });
  });

  it('should answer ping with pong', async () => {
    const client = await open('dock-3');
    const pong = new Promise<unknown>((resolve) => client.once('pong', resolve));
    client.emit('ping');
    expect(await pong).toMatchObject({ timestamp: expect.any(Number) });
  });
});
