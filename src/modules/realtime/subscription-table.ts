/**
 * =============================================================================
 * SUBSCRIPTION TABLE
 * =============================================================================
 *
 * Which sessions asked for updates on which topic. One table for live
 * delivery locations, one for package updates.
 *
 * Two indexes are kept in step:
 *   topicId      -> Set<connectionId>   (fan-out)
 *   connectionId -> Set<topicId>        (teardown in O(own subscriptions))
 *
 * Memory-only; clients re-subscribe after reconnecting.
 * =============================================================================
 */

import { ConnectionId, DeliveryId } from './realtime.types';

export class SubscriptionTable<TopicId extends number = DeliveryId> {
  private readonly byTopic = new Map<TopicId, Set<ConnectionId>>();
  private readonly byConnection = new Map<ConnectionId, Set<TopicId>>();

  /**
   * Add (connection, topic). Repeat calls have no further effect.
   */
  subscribe(connectionId: ConnectionId, topicId: TopicId): void {
    let subscribers = this.byTopic.get(topicId);
    if (!subscribers) {
      subscribers = new Set();
      this.byTopic.set(topicId, subscribers);
    }
    subscribers.add(connectionId);

    let topics = this.byConnection.get(connectionId);
    if (!topics) {
      topics = new Set();
      this.byConnection.set(connectionId, topics);
    }
    topics.add(topicId);
  }

  unsubscribe(connectionId: ConnectionId, topicId: TopicId): void {
    const topics = this.byConnection.get(connectionId);
    if (!topics?.delete(topicId)) return;

    if (topics.size === 0) {
      this.byConnection.delete(connectionId);
    }
    this.removeSubscriber(topicId, connectionId);
  }

  subscribersOf(topicId: TopicId): ConnectionId[] {
    return Array.from(this.byTopic.get(topicId) ?? []);
  }

  subscriptionsOf(connectionId: ConnectionId): TopicId[] {
    return Array.from(this.byConnection.get(connectionId) ?? []);
  }

  /**
   * Drop every subscription owned by a connection (teardown).
   */
  clear(connectionId: ConnectionId): void {
    const topics = this.byConnection.get(connectionId);
    if (!topics) return;

    for (const topicId of topics) {
      this.removeSubscriber(topicId, connectionId);
    }
    this.byConnection.delete(connectionId);
  }

  /** Total (connection, topic) pairs */
  get size(): number {
    let total = 0;
    for (const topics of this.byConnection.values()) {
      total += topics.size;
    }
    return total;
  }

  /** Topics with at least one subscriber */
  get topicCount(): number {
    return this.byTopic.size;
  }

  private removeSubscriber(topicId: TopicId, connectionId: ConnectionId): void {
    const subscribers = this.byTopic.get(topicId);
    if (!subscribers) return;
    subscribers.delete(connectionId);
    if (subscribers.size === 0) {
      this.byTopic.delete(topicId);
    }
  }
}
