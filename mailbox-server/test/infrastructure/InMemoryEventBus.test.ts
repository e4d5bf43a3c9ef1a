import { InMemoryEventBus } from '../../src/infrastructure/events/InMemoryEventBus';
import { createMockLogger } from '../helpers';

describe('InMemoryEventBus', () => {
  let logger: ReturnType<typeof createMockLogger>;
  let eventBus: InMemoryEventBus;

  beforeEach(() => {
    logger = createMockLogger();
    eventBus = new InMemoryEventBus(logger);
  });

  it('should deliver payloads to every handler', async () => {
    const first = jest.fn();
    const second = jest.fn();
    eventBus.on('email:purged', first);
    eventBus.on('email:purged', second);

    await eventBus.emit('email:purged', { id: 'e1' });

    expect(first).toHaveBeenCalledWith({ id: 'e1' });
    expect(second).toHaveBeenCalledWith({ id: 'e1' });
    expect(eventBus.listenerCount('email:purged')).toBe(2);
  });

  it('should log a failing handler without affecting the others', async () => {
    const healthy = jest.fn();
    eventBus.on('email:read', async () => {
      throw new Error('handler broke');
    });
    eventBus.on('email:read', healthy);

    await expect(eventBus.emit('email:read', { id: 'e1', folder: 'inbox' })).resolves.toBeUndefined();

    expect(healthy).toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledWith('Error in event handler for email:read:', new Error('handler broke'));
  });

  it('should run once handlers a single time', async () => {
    const handler = jest.fn();
    eventBus.once('email:purged', handler);

    await eventBus.emit('email:purged', { id: 'e1' });
    await eventBus.emit('email:purged', { id: 'e2' });

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('should stop delivering after off and removeAllListeners', async () => {
    const handler = jest.fn();
    eventBus.on('email:purged', handler);
    eventBus.off('email:purged', handler);
    eventBus.on('folders:updated', handler);
    eventBus.removeAllListeners();

    await eventBus.emit('email:purged', { id: 'e1' });
    await eventBus.emit('folders:updated', []);

    expect(handler).not.toHaveBeenCalled();
  });
});
