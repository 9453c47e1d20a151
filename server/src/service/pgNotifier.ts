import { logger } from '@/logger';
import type { Notifier } from './notifier';
import type { Queryable } from './sqlClient';

// NOTIFY のペイロード上限（既定 8000 バイト）
const MAX_PAYLOAD_BYTES = 8000;

// Postgres の LISTEN/NOTIFY で配信する。購読側は LISTEN "case.{id}.calculations" で受け取る。
export const createPgNotifier = (db: Queryable): Notifier => ({
  async publish(topic, notification) {
    const payload = JSON.stringify(notification);
    if (Buffer.byteLength(payload) > MAX_PAYLOAD_BYTES) {
      logger.warn('Notification payload too large; dropped', {
        topic,
        event: notification.event,
      });
      return;
    }
    await db.query('SELECT pg_notify($1, $2)', [topic, payload]);
  },
});
