import type { CalculationNotification } from '@/model/notification';
import { logger } from '@/logger';

export interface Notifier {
  publish(topic: string, notification: CalculationNotification): Promise<void>;
}

export interface PublishedNotification {
  topic: string;
  notification: CalculationNotification;
}

type Listener = (notification: CalculationNotification) => void;

// 同一プロセス内の購読者へ配信し、配信履歴を残す（テスト・CLI 用）
export const createInMemoryNotifier = (): Notifier & {
  published: PublishedNotification[];
  subscribe(topic: string, listener: Listener): () => void;
} => {
  const published: PublishedNotification[] = [];
  const listeners = new Map<string, Set<Listener>>();

  return {
    published,

    subscribe(topic, listener) {
      const set = listeners.get(topic) ?? new Set<Listener>();
      set.add(listener);
      listeners.set(topic, set);
      return () => {
        set.delete(listener);
      };
    },

    async publish(topic, notification) {
      published.push({ topic, notification: structuredClone(notification) });
      for (const listener of listeners.get(topic) ?? []) {
        try {
          listener(notification);
        } catch (error) {
          logger.error('Notification listener failed', { topic }, error);
        }
      }
    },
  };
};

// 配信を無効化した設定（CALC_BROADCASTING_ENABLED=false）で使う
export const createDisabledNotifier = (): Notifier => ({
  async publish(topic, notification) {
    logger.debug('Broadcasting disabled; notification dropped', {
      topic,
      event: notification.event,
    });
  },
});
