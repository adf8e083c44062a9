import * as http from 'http';
import { AddressInfo } from 'net';
import WebSocket, { WebSocketServer } from 'ws';
import { WebSocketBridge } from '../../src/infrastructure/websocket/WebSocketBridge';
import { InMemoryEventBus } from '../../src/infrastructure/events/InMemoryEventBus';
import { CatalogProject } from '../../src/types';
import { RecordingLogger, T0, waitFor } from '../helpers';

interface ReceivedMessage {
  type: string;
  data?: { userId?: string };
}

interface TestClient {
  ws: WebSocket;
  messages: ReceivedMessage[];
}

describe('WebSocketBridge', () => {
  let server: http.Server;
  let wss: WebSocketServer;
  let bus: InMemoryEventBus;
  let bridge: WebSocketBridge;
  let url: string;
  const clients: TestClient[] = [];

  async function connect(): Promise<TestClient> {
    const ws = new WebSocket(url);
    const client: TestClient = { ws, messages: [] };
    ws.on('message', raw => {
      const message: ReceivedMessage = JSON.parse(raw.toString());
      client.messages.push(message);
    });
    await new Promise<void>((resolve, reject) => {
      ws.once('open', () => resolve());
      ws.once('error', reject);
    });
    clients.push(client);
    return client;
  }

  const ofType = (client: TestClient, type: string) => client.messages.filter(m => m.type === type);

  const project: CatalogProject = {
    id: 'proj_1',
    name: 'Web Foundations',
    description: '',
    projectType: 'project',
    createdAt: T0
  };

  beforeEach(async () => {
    server = http.createServer();
    wss = new WebSocketServer({ server });
    bus = new InMemoryEventBus(new RecordingLogger());
    bridge = new WebSocketBridge(wss, bus, new RecordingLogger());
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address: AddressInfo | string | null = server.address();
    const port = address && typeof address === 'object' ? address.port : 0;
    url = `ws://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    for (const { ws } of clients.splice(0)) {
      ws.terminate();
    }
    await new Promise<void>(resolve => wss.close(() => resolve()));
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  it('should filter user events by subscription and send catalog events to everyone', async () => {
    const subscribed = await connect();
    const everything = await connect();
    subscribed.ws.send(JSON.stringify({ type: 'subscribe', userIds: ['u1'] }));
    await waitFor(() => ofType(subscribed, 'subscribed').length === 1);

    await bus.emit('preferences:updated', { userId: 'u2', preferences: [], updatedAt: T0 });
    await bus.emit('catalog:project_created', project);
    await bus.emit('preferences:updated', { userId: 'u1', preferences: ['AI'], updatedAt: T0 });

    await waitFor(() => everything.messages.length === 3 && subscribed.messages.length === 3);
    expect(subscribed.messages.map(m => [m.type, m.data?.userId])).toEqual([
      ['subscribed', undefined],
      ['catalog:project_created', undefined],
      ['preferences:updated', 'u1']
    ]);
    expect(everything.messages.map(m => m.data?.userId)).toEqual(['u2', undefined, 'u1']);
  });

  it('should answer pings', async () => {
    const client = await connect();

    client.ws.send(JSON.stringify({ type: 'ping' }));

    await waitFor(() => ofType(client, 'pong').length === 1);
  });

  it('should report connected clients', async () => {
    await connect();
    await waitFor(() => bridge.getClientCount() === 1);

    expect(bridge.getClientStatus()).toEqual([{ readyState: 1, readyStateText: 'OPEN' }]);
  });
});
