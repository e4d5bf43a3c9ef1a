import { EventEmitter } from 'events';
import { WebSocket, WebSocketServer } from 'ws';
import { WebSocketBridge } from '../../src/infrastructure/websocket/WebSocketBridge';
import { InMemoryEventBus } from '../../src/infrastructure/events/InMemoryEventBus';
import { createMockLogger } from '../helpers';

class FakeClient extends EventEmitter {
  readyState: number = WebSocket.OPEN;
  sent: Array<Record<string, unknown>> = [];

  send(message: string): void {
    this.sent.push(JSON.parse(message));
  }

  types(): unknown[] {
    return this.sent.map(m => m.type);
  }
}

class FakeServer extends EventEmitter {
  clients = new Set<FakeClient>();

  connect(): FakeClient {
    const client = new FakeClient();
    this.clients.add(client);
    this.emit('connection', client);
    return client;
  }
}

describe('WebSocketBridge', () => {
  let server: FakeServer;
  let eventBus: InMemoryEventBus;
  let bridge: WebSocketBridge;

  beforeEach(() => {
    const logger = createMockLogger();
    server = new FakeServer();
    eventBus = new InMemoryEventBus(logger);
    bridge = new WebSocketBridge(server as unknown as WebSocketServer, eventBus, logger);
  });

  function subscribe(client: FakeClient, folders: string[]): void {
    client.emit('message', Buffer.from(JSON.stringify({ type: 'subscribe', folders })));
  }

  it('should answer ping with pong', () => {
    const client = server.connect();
    client.emit('message', Buffer.from('{"type":"ping"}'));
    expect(client.types()).toEqual(['pong']);
  });

  it('should acknowledge a subscription and report it in client status', () => {
    const client = server.connect();
    subscribe(client, ['inbox', 'archive']);

    expect(client.sent[0]).toMatchObject({ type: 'subscribed', folders: ['inbox', 'archive'] });
    expect(bridge.getClientCount()).toBe(1);
    expect(bridge.getClientStatus()).toEqual([{ readyState: 1, readyStateText: 'OPEN', folders: ['inbox', 'archive'] }]);
  });

  it('should ignore malformed and unknown messages', () => {
    const client = server.connect();
    client.emit('message', Buffer.from('not json'));
    client.emit('message', Buffer.from('{"type":"reboot"}'));
    expect(client.sent).toEqual([]);
  });

  it('should filter folder events by subscription', async () => {
    const everything = server.connect();
    const spamOnly = server.connect();
    const archiveOnly = server.connect();
    subscribe(spamOnly, ['spam']);
    subscribe(archiveOnly, ['archive']);

    await eventBus.emit('email:moved', { id: 'e1', from: 'inbox', to: 'archive' });

    expect(everything.types()).toEqual(['email:moved']);
    expect(spamOnly.types()).toEqual(['subscribed']);
    expect(archiveOnly.types()).toEqual(['subscribed', 'email:moved']);
    expect(archiveOnly.sent[1]).toMatchObject({ event: 'email:moved', data: { id: 'e1', from: 'inbox', to: 'archive' } });
  });

  it('should send trash events to trash subscribers', async () => {
    const trash = server.connect();
    subscribe(trash, ['trash']);

    await eventBus.emit('email:trashed', { id: 'e1', from: 'inbox' });
    await eventBus.emit('email:purged', { id: 'e1' });

    expect(trash.types()).toEqual(['subscribed', 'email:trashed', 'email:purged']);
  });

  it('should send folder summaries to every client', async () => {
    const spamOnly = server.connect();
    subscribe(spamOnly, ['spam']);

    await eventBus.emit('folders:updated', [{ name: 'inbox', emailCount: 1, unreadCount: 1 }]);

    expect(spamOnly.types()).toEqual(['subscribed', 'folders:updated']);
  });

  it('should skip clients that are not open', async () => {
    const closing = server.connect();
    closing.readyState = WebSocket.CLOSING;

    await eventBus.emit('email:purged', { id: 'e1' });

    expect(closing.sent).toEqual([]);
  });

  it('should drop a subscription on unsubscribe and on close', async () => {
    const client = server.connect();
    subscribe(client, ['spam']);
    client.emit('message', Buffer.from('{"type":"unsubscribe"}'));

    await eventBus.emit('email:purged', { id: 'e1' });
    expect(client.types()).toEqual(['subscribed', 'unsubscribed', 'email:purged']);

    subscribe(client, ['spam']);
    client.emit('close');
    expect(bridge.getClientStatus()[0].folders).toBeNull();
  });
});
