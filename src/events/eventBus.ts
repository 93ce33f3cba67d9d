import Redis from 'ioredis';

import { config } from '../config';
import { createServiceLogger } from '../observability';
import { EventType, LedgerNotification, EventHandler, isEventType } from '../types/events';

const log = createServiceLogger('event-bus');

export const CHANNEL_PREFIX = 'ledger:';

export const channelFor = (eventType: EventType): string => `${CHANNEL_PREFIX}${eventType}`;

const waitForConnect = (client: Redis): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    const onConnect = (): void => {
      client.off('error', onError);
      resolve();
    };
    const onError = (err: Error): void => {
      client.off('connect', onConnect);
      reject(err);
    };
    client.once('connect', onConnect);
    client.once('error', onError);
  });

/**
 * Errors after the initial connect would otherwise be unhandled.
 */
const logErrors = (client: Redis, name: string): Redis => {
  client.on('error', (err: Error) => {
    log.error({ err, client: name }, 'Event bus Redis client error');
  });
  return client;
};

/**
 * Redis pub/sub relay for committed ledger notifications.
 * One channel per event type: `ledger:<EventType>`.
 */
export class EventBus {
  private publisher: Redis | null = null;
  private subscriber: Redis | null = null;
  private handlers: Map<EventType, EventHandler[]> = new Map();
  private isConnected = false;

  async connect(): Promise<void> {
    if (this.isConnected) {
      return;
    }

    const redisConfig = {
      host: config.redis.host,
      port: config.redis.port,
      password: config.redis.password,
      maxRetriesPerRequest: 3,
      retryStrategy: (times: number) => {
        if (times > 3) {
          return null;
        }
        return Math.min(times * 100, 3000);
      },
    };

    const publisher = logErrors(new Redis(redisConfig), 'publisher');
    const subscriber = logErrors(new Redis(redisConfig), 'subscriber');
    this.publisher = publisher;
    this.subscriber = subscriber;

    await Promise.all([waitForConnect(publisher), waitForConnect(subscriber)]);

    subscriber.on('message', (channel: string, message: string) => {
      this.dispatch(channel, message).catch((error: unknown) => {
        log.error({ channel, error }, 'Error dispatching ledger notification');
      });
    });

    this.isConnected = true;
    log.info('Event bus connected to Redis');
  }

  async disconnect(): Promise<void> {
    if (!this.isConnected) {
      return;
    }

    if (this.publisher) {
      await this.publisher.quit();
      this.publisher = null;
    }

    if (this.subscriber) {
      await this.subscriber.quit();
      this.subscriber = null;
    }

    this.handlers.clear();
    this.isConnected = false;
    log.info('Event bus disconnected');
  }

  async publish(notification: LedgerNotification): Promise<void> {
    if (!this.publisher || !this.isConnected) {
      throw new Error('Event bus not connected');
    }

    await this.publisher.publish(channelFor(notification.eventType), JSON.stringify(notification));
    log.debug(
      { eventType: notification.eventType, sequence: notification.sequence, logIndex: notification.logIndex },
      'Notification published'
    );
  }

  async subscribe(eventType: EventType, handler: EventHandler): Promise<void> {
    if (!this.subscriber || !this.isConnected) {
      throw new Error('Event bus not connected');
    }

    const handlers = this.handlers.get(eventType) || [];
    handlers.push(handler);
    this.handlers.set(eventType, handlers);

    await this.subscriber.subscribe(channelFor(eventType));
    log.info({ eventType }, 'Subscribed to ledger notifications');
  }

  async unsubscribe(eventType: EventType): Promise<void> {
    if (!this.subscriber || !this.isConnected) {
      return;
    }

    this.handlers.delete(eventType);
    await this.subscriber.unsubscribe(channelFor(eventType));
    log.info({ eventType }, 'Unsubscribed from ledger notifications');
  }

  getStatus(): { connected: boolean } {
    return { connected: this.isConnected };
  }

  private async dispatch(channel: string, message: string): Promise<void> {
    let notification: LedgerNotification;
    try {
      notification = JSON.parse(message);
    } catch (error) {
      log.error({ channel, error }, 'Error parsing ledger notification');
      return;
    }

    if (!isEventType(notification.eventType)) {
      log.warn({ channel }, 'Ignoring message with unknown event type');
      return;
    }
    notification.timestamp = new Date(notification.timestamp);

    const handlers = this.handlers.get(notification.eventType) || [];
    for (const handler of handlers) {
      try {
        await handler(notification);
      } catch (error) {
        log.error({ eventType: notification.eventType, error }, 'Error handling ledger notification');
      }
    }
  }
}

export const eventBus = new EventBus();
