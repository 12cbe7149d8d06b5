import type { NewResultNotification } from '../../shared/types';

export const DEFAULT_NOTIFICATION_CAPACITY = 100;

export interface NotificationQueue {
  enqueue(notification: NewResultNotification): void;
  tryDequeue(): NewResultNotification | null;
  peek(): NewResultNotification | null;
  drain(): NewResultNotification[];
  isEmpty(): boolean;
  readonly size: number;
}

export function createNotificationQueue(capacity = DEFAULT_NOTIFICATION_CAPACITY): NotificationQueue {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new Error(`Notification queue capacity must be a positive integer, got ${capacity}`);
  }

  const pending: NewResultNotification[] = [];

  const enqueue = (notification: NewResultNotification) => {
    if (pending.length >= capacity) {
      const dropped = pending.shift();
      console.warn(
        `[notifications] queue full (${capacity}); dropped notification for ${dropped?.scenarioName ?? 'unknown'}`
      );
    }
    pending.push(Object.freeze({ ...notification }));
  };

  const tryDequeue = () => pending.shift() ?? null;

  const peek = () => pending[0] ?? null;

  const drain = () => pending.splice(0, pending.length);

  const isEmpty = () => pending.length === 0;

  return {
    enqueue,
    tryDequeue,
    peek,
    drain,
    isEmpty,
    get size() {
      return pending.length;
    }
  };
}
