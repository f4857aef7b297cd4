import type { Alert } from './types.js';

/**
 * Alerts ordered by trigger time. Alerts with equal trigger times keep
 * their insertion order.
 */
export class AlertQueue {
  private alerts: Alert[] = [];

  get size(): number {
    return this.alerts.length;
  }

  isEmpty(): boolean {
    return this.alerts.length === 0;
  }

  /**
   * Insert after every alert with triggerAt <= the new one
   */
  insert(alert: Alert): void {
    let low = 0;
    let high = this.alerts.length;

    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.alerts[mid].triggerAt <= alert.triggerAt) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }

    this.alerts.splice(low, 0, alert);
  }

  insertAll(alerts: Iterable<Alert>): void {
    for (const alert of alerts) {
      this.insert(alert);
    }
  }

  peek(): Alert | undefined {
    return this.alerts[0];
  }

  /**
   * Remove and return every alert due at `now`, earliest first
   */
  takeDue(now: number): Alert[] {
    let count = 0;
    while (count < this.alerts.length && this.alerts[count].triggerAt <= now) {
      count++;
    }
    return this.alerts.splice(0, count);
  }

  /**
   * Remove alerts matching the predicate and return them
   */
  removeWhere(predicate: (alert: Alert) => boolean): Alert[] {
    const removed: Alert[] = [];
    const kept: Alert[] = [];

    for (const alert of this.alerts) {
      (predicate(alert) ? removed : kept).push(alert);
    }

    this.alerts = kept;
    return removed;
  }

  filter(predicate: (alert: Alert) => boolean): Alert[] {
    return this.alerts.filter(predicate);
  }

  toArray(): Alert[] {
    return [...this.alerts];
  }

  clear(): Alert[] {
    const removed = this.alerts;
    this.alerts = [];
    return removed;
  }
}
