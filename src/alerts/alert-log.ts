import { Alert } from '../types';

export type NewAlert = Omit<Alert, 'id'>;

/**
 * Bounded alert history. Once full, the oldest alert is dropped for each new one.
 */
export class AlertLog {
  private alerts: Alert[] = [];
  private nextId: number = 1;
  private readonly maxHistory: number;

  constructor(maxHistory: number = 100) {
    if (!Number.isInteger(maxHistory) || maxHistory < 1) {
      throw new Error('Alert history size must be a positive integer');
    }
    this.maxHistory = maxHistory;
  }

  append(alert: NewAlert): Alert {
    const stored: Alert = { id: this.nextId++, ...alert };
    this.alerts.push(stored);
    if (this.alerts.length > this.maxHistory) {
      this.alerts.splice(0, this.alerts.length - this.maxHistory);
    }
    return stored;
  }

  /**
   * Most recent alerts, oldest first
   */
  recent(limit?: number): Alert[] {
    if (limit === undefined) {
      return this.alerts.map(a => ({ ...a }));
    }
    if (limit <= 0) {
      return [];
    }
    return this.alerts.slice(-limit).map(a => ({ ...a }));
  }

  countSince(since: Date): number {
    return this.alerts.filter(a => a.timestamp.getTime() > since.getTime()).length;
  }

  get size(): number {
    return this.alerts.length;
  }

  get capacity(): number {
    return this.maxHistory;
  }

  clear(): void {
    this.alerts = [];
    this.nextId = 1;
  }
}
