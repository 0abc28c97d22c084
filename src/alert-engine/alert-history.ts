/**
 * Alert history
 * Optional append-only log of alert transitions, layered on top of the single alert entity
 */

import { AlertCategory, AlertTransition } from '../types';

export interface AlertHistoryFilter {
  locationId?: string;
  alertId?: string;
  category?: AlertCategory;
}

export interface AlertHistoryLog {
  record(transition: AlertTransition): Promise<void>;
  list(filter?: AlertHistoryFilter): Promise<AlertTransition[]>;
}

const DEFAULT_CAPACITY = 10000;

/**
 * Bounded in-process log; the oldest entries are dropped past capacity
 */
export class InMemoryAlertHistoryLog implements AlertHistoryLog {
  private entries: AlertTransition[] = [];

  constructor(private readonly capacity: number = DEFAULT_CAPACITY) {}

  async record(transition: AlertTransition): Promise<void> {
    this.entries.push({ ...transition });
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  async list(filter: AlertHistoryFilter = {}): Promise<AlertTransition[]> {
    return this.entries.filter(entry =>
      (filter.locationId === undefined || entry.locationId === filter.locationId) &&
      (filter.alertId === undefined || entry.alertId === filter.alertId) &&
      (filter.category === undefined || entry.category === filter.category)
    );
  }
}
