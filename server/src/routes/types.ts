import type { MonitorSnapshot } from '../services/polling/AppointmentMonitor';
import type { AggregateResult } from '../services/polling/types';

/** The parts of the appointment monitor the HTTP routes read. */
export interface MonitorView {
  getSnapshot(): MonitorSnapshot;
  isCycleRunning(): boolean;
  checkNow(): Promise<AggregateResult>;
}

export interface SubscriberCount {
  readonly size: number;
}
