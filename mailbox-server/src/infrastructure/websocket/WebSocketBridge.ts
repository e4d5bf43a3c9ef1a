import { WebSocketServer, WebSocket } from 'ws';
import { z } from 'zod';
import { IEventBus } from '../../domain/events/IEventBus';
import { ILogger } from '../../domain/common/ILogger';
import { EventName, EventPayload } from '../../domain/events/DomainEvents';

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('subscribe'), folders: z.array(z.string()) }),
  z.object({ type: z.literal('unsubscribe') }),
]);

/**
 * Bridges domain events to WebSocket clients.
 *
 * Clients can send a `subscribe` message with `folders` to receive only
 * events touching those folders. Clients without a subscription receive
 * ALL events. `folders:updated` goes to everyone.
 */
export class WebSocketBridge {
  private logger: ILogger;
  /** Per-client folder filters. Clients not in this map get all events. */
  private subscriptions = new Map<WebSocket, Set<string>>();

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
        this.handleClientMessage(ws, data.toString());
      });
    });
  }

  handleClientMessage(ws: WebSocket, raw: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn('Failed to parse WebSocket message');
      return;
    }

    const result = clientMessageSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.debug('Ignoring unrecognized WebSocket message');
      return;
    }

    const message = result.data;
    switch (message.type) {
      case 'ping':
        ws.send(JSON.stringify({ type: 'pong', timestamp: Date.now() }));
        return;
      case 'subscribe': {
        const folders = new Set(message.folders);
        this.subscriptions.set(ws, folders);
        ws.send(JSON.stringify({ type: 'subscribed', folders: [...folders], timestamp: Date.now() }));
        return;
      }
      case 'unsubscribe':
        this.subscriptions.delete(ws);
        ws.send(JSON.stringify({ type: 'unsubscribed', timestamp: Date.now() }));
        return;
    }
  }

  private setupEventHandlers(): void {
    this.eventBus.on('email:received', (email) => this.broadcast('email:received', email, [email.folder]));
    this.eventBus.on('email:read', (data) => this.broadcast('email:read', data, [data.folder]));
    this.eventBus.on('email:moved', (data) => this.broadcast('email:moved', data, [data.from, data.to]));
    this.eventBus.on('email:trashed', (data) => this.broadcast('email:trashed', data, [data.from, 'trash']));
    this.eventBus.on('email:purged', (data) => this.broadcast('email:purged', data, ['trash']));
    this.eventBus.on('folders:updated', (data) => this.broadcast('folders:updated', data));

    this.logger.info('WebSocket bridge subscribed to mailbox events');
  }

  /**
   * Broadcast a message to connected WebSocket clients.
   * Clients with a folder filter only receive events touching one of
   * their folders; events without folders reach every client.
   */
  private broadcast<K extends EventName>(event: K, data: EventPayload<K>, folders?: string[]): void {
    const message = JSON.stringify({
      type: event,
      event,
      data,
      timestamp: Date.now()
    });

    this.wss.clients.forEach((client) => {
      if (client.readyState !== WebSocket.OPEN) return;

      const sub = this.subscriptions.get(client);
      if (sub && folders && !folders.some(f => sub.has(f))) {
        return;
      }

      client.send(message);
    });
  }

  getClientCount(): number {
    return this.wss.clients.size;
  }

  /**
   * Get status of all connected clients.
   */
  getClientStatus(): Array<{ readyState: number; readyStateText: string; folders: string[] | null }> {
    const clients: Array<{ readyState: number; readyStateText: string; folders: string[] | null }> = [];
    this.wss.clients.forEach((client) => {
      const sub = this.subscriptions.get(client);
      clients.push({
        readyState: client.readyState,
        readyStateText: ['CONNECTING', 'OPEN', 'CLOSING', 'CLOSED'][client.readyState],
        folders: sub ? [...sub] : null
      });
    });
    return clients;
  }
}
