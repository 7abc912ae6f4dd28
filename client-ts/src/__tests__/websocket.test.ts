import { describe, it, expect, afterEach } from 'vitest';
import { WebSocketServer } from 'ws';
import type { WebSocket } from 'ws';
import { StompClient } from '../client';
import { ConnectionLostError } from '../errors';
import { silentLogger } from '../logger';
import { WebSocketTransport } from '../transport/websocket';

const OPTIONS = { insecure: false, pingIntervalMs: 0 };

function listen(): Promise<{ server: WebSocketServer; port: number }> {
  return new Promise((resolve, reject) => {
    const server = new WebSocketServer({ host: '127.0.0.1', port: 0 });
    server.once('error', reject);
    server.once('listening', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('expected a TCP address'));
        return;
      }
      resolve({ server, port: address.port });
    });
  });
}

function stop(server: WebSocketServer): Promise<void> {
  for (const client of server.clients) {
    client.terminate();
  }
  return new Promise((resolve) => server.close(() => resolve()));
}

function nextConnection(server: WebSocketServer): Promise<WebSocket> {
  return new Promise((resolve) => server.once('connection', resolve));
}

describe('WebSocketTransport', () => {
  let server: WebSocketServer | null = null;

  afterEach(async () => {
    if (server) {
      await stop(server);
      server = null;
    }
  });

  it('should exchange text messages', async () => {
    const started = await listen();
    server = started.server;
    const accepted = nextConnection(started.server);
    const transport = new WebSocketTransport(`ws://127.0.0.1:${started.port}`, OPTIONS);
    const received = new Promise<string | Uint8Array>((resolve) => transport.onMessage(resolve));

    await transport.connect();
    const peer = await accepted;
    const echoed = new Promise<string>((resolve) => peer.once('message', (data) => resolve(data.toString())));

    expect(transport.isConnected()).toBe(true);
    await transport.send('SEND\ndestination:/a\n\nx\0');
    expect(await echoed).toBe('SEND\ndestination:/a\n\nx\0');

    peer.send('MESSAGE\ndestination:/a\n\ny\0');
    expect(await received).toBe('MESSAGE\ndestination:/a\n\ny\0');

    await transport.disconnect();
    expect(transport.isConnected()).toBe(false);
  });

  it('should deliver binary messages as bytes', async () => {
    const started = await listen();
    server = started.server;
    const accepted = nextConnection(started.server);
    const transport = new WebSocketTransport(`ws://127.0.0.1:${started.port}`, OPTIONS);
    const received = new Promise<string | Uint8Array>((resolve) => transport.onMessage(resolve));

    await transport.connect();
    (await accepted).send(Buffer.from('\n'));

    const data = await received;
    if (typeof data === 'string') {
      throw new Error('expected bytes');
    }
    expect(data).toBeInstanceOf(Uint8Array);
    expect(Buffer.from(data).toString('utf8')).toBe('\n');
    await transport.disconnect();
  });

  it('should report the close code and reason from the peer', async () => {
    const started = await listen();
    server = started.server;
    const accepted = nextConnection(started.server);
    const transport = new WebSocketTransport(`ws://127.0.0.1:${started.port}`, OPTIONS);
    const closed = new Promise<{ code?: number; reason?: string }>((resolve) =>
      transport.onClose((code, reason) => resolve({ code, reason })),
    );

    await transport.connect();
    (await accepted).close(4000, 'broker shutdown');

    expect(await closed).toEqual({ code: 4000, reason: 'broker shutdown' });
    expect(transport.isConnected()).toBe(false);
  });

  it('should reject connect when nothing listens', async () => {
    const started = await listen();
    await stop(started.server);
    const transport = new WebSocketTransport(`ws://127.0.0.1:${started.port}`, OPTIONS);

    await expect(transport.connect()).rejects.toBeInstanceOf(ConnectionLostError);
  });

  it('should reject send before connect', async () => {
    const transport = new WebSocketTransport('ws://127.0.0.1:1', OPTIONS);

    await expect(transport.send('\n')).rejects.toThrow('WebSocket is not open');
  });
});

describe('StompClient over WebSocket', () => {
  let server: WebSocketServer | null = null;

  afterEach(async () => {
    if (server) {
      await stop(server);
      server = null;
    }
  });

  it('should connect, subscribe, receive, send and disconnect against a broker', async () => {
    const started = await listen();
    server = started.server;
    const frames: string[] = [];
    const disconnected = new Promise<void>((resolve) => {
      started.server.on('connection', (peer) => {
        peer.on('message', (data) => {
          const text = data.toString();
          frames.push(text);
          const command = text.split('\n')[0];
          if (command === 'CONNECT') {
            peer.send('CONNECTED\nversion:1.1\nheart-beat:0,0\n\n\0');
          } else if (command === 'SUBSCRIBE') {
            peer.send('MESSAGE\ndestination:/topic/prices\nmessage-id:1\nsubscription:x\n\n{"price":1.5}\0');
          } else if (command === 'DISCONNECT') {
            resolve();
          }
        });
      });
    });

    const client = new StompClient({
      host: `127.0.0.1:${started.port}`,
      secure: false,
      username: 'guest',
      passcode: 'test-secret',
      pingIntervalMs: 0,
      connectTimeoutMs: 2_000,
      logger: silentLogger,
    });

    await expect(client.connect()).resolves.toBe(true);
    const body = await new Promise<string | undefined>((resolve) => {
      client.subscribe('/topic/prices', (received) => resolve(received));
    });
    await expect(client.send('/topic/prices', 'abc')).resolves.toBe(true);
    await client.disconnect();
    await disconnected;

    expect(body).toBe('{"price":1.5}');
    expect(frames.map((frame) => frame.split('\n')[0])).toEqual(['CONNECT', 'SUBSCRIBE', 'SEND', 'DISCONNECT']);
    expect(frames[2]).toBe('SEND\ndestination:/topic/prices\ncontent-length:3\n\nabc\0');
  });
});
