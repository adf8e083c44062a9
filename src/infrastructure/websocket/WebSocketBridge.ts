import { WebSocketServer, WebSocket } from 'ws';
import { z } from 'zod';
import { IEventBus } from '../../domain/events/IEventBus';
import { ILogger } from '../../domain/common/ILogger';
import { EventName, EventPayload } from '../../domain/events/DomainEvents';

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('subscribe'), userIds: z.array(z.string()) }),
  z.object({ type: z.literal('unsubscribe') })
]);

/**
 * Bridges domain events to WebSocket clients (learner UIs and admin dashboards).
 *
 * Clients can send a `subscribe` message with `userIds` to receive only
 * events related to those users. Catalog events carry no user and reach
 * every client. Clients without a subscription receive ALL events.
 */
export class WebSocketBridge {
  private logger: ILogger;
  /** Per-client user subscription filters. Clients not in this map get all events. */
  private subscriptions = new Map<WebSocket, Set<string>>();

  static readonly EVENTS: readonly EventName[] = [
    'engagement:updated',
    'conversation:turn',
    'assignment:created',
    'assignment:updated',
    'learner:tasks_refreshed',
    'preferences:updated',
    'catalog:project_created',
    'catalog:task_created',
    'notify:nudge_sent'
  ];

  constructor(
    private wss: WebSocketServer,
    private eventBus: IEventBus,
    logger: ILogger
  ) {
    this.logger = logger;
    this.setupEventHandlers();
    this.setupConnectionHandlers();
  }

  private setupConnectionHandlers(): void {
    this.wss.on('connection', (ws: WebSocket) => {
      ws.on('close', () => {
        this.subscriptions.delete(ws);
      });

      ws.on('error', (error) => {
        this.logger.error('WebSocket client error:', error);
      });

      ws.on('message', (data) => {
        let raw: unknown;
        try {
          raw = JSON.parse(data.toString());
        } catch {
          this.logger.warn('Failed to parse WebSocket message');
          return;
        }
        this.handleClientMessage(ws, raw);
      });
    });
  }

  private handleClientMessage(ws: WebSocket, raw: unknown): void {
    const parsed = clientMessageSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.debug('Ignoring unrecognized WebSocket message');
      return;
    }

    const message = parsed.data;
    switch (message.type) {
      case 'ping':
        ws.send(JSON.stringify({ type: 'pong', timestamp: Date.now() }));
        return;
      case 'subscribe': {
        const ids = new Set(message.userIds);
        this.subscriptions.set(ws, ids);
        ws.send(JSON.stringify({ type: 'subscribed', userIds: [...ids], timestamp: Date.now() }));
        return;
      }
      case 'unsubscribe':
        this.subscriptions.delete(ws);
        ws.send(JSON.stringify({ type: 'unsubscribed', timestamp: Date.now() }));
        return;
    }
  }

  private setupEventHandlers(): void {
    for (const event of WebSocketBridge.EVENTS) {
      this.eventBus.on(event, (data) => {
        this.broadcast(event, data);
      });
    }

    this.logger.info(`WebSocket bridge subscribed to ${WebSocketBridge.EVENTS.length} events`);
  }

  /**
   * The user an event belongs to, if any.
   */
  private extractUserId(data: EventPayload<EventName>): string | undefined {
    return 'userId' in data ? data.userId : undefined;
  }

  /**
   * Broadcast a message to connected WebSocket clients.
   * Clients with a subscription filter only receive events for their users.
   */
  private broadcast(event: EventName, data: EventPayload<EventName>): void {
    const message = JSON.stringify({
      type: event,
      event,
      data,
      timestamp: Date.now()
    });

    const eventUserId = this.extractUserId(data);

    this.wss.clients.forEach((client) => {
      if (client.readyState !== WebSocket.OPEN) return;

      const sub = this.subscriptions.get(client);
      if (sub && eventUserId && !sub.has(eventUserId)) {
        return;
      }

      client.send(message);
    });
  }

  getClientCount(): number {
    return this.wss.clients.size;
  }

  getClientStatus(): Array<{ readyState: number; readyStateText: string }> {
    const states = ['CONNECTING', 'OPEN', 'CLOSING', 'CLOSED'];
    const clients: Array<{ readyState: number; readyStateText: string }> = [];
    this.wss.clients.forEach((client) => {
      clients.push({
        readyState: client.readyState,
        readyStateText: states[client.readyState] ?? 'UNKNOWN'
      });
    });
    return clients;
  }
}
