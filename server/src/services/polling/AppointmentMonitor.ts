import { EventEmitter } from 'events';
import { LOCATIONS, Location } from '../../config/locations';
import logger from '../../utils/logger';
import { INotifier } from '../notifications/types';
import { detectChanges } from './ChangeDetector';
import { LocationPoller } from './LocationPoller';
import {
  AggregateResult,
  AvailableLocation,
  CycleFailedEvent,
  CycleReport,
  FAILED_POLL_STATUSES,
  PollingEventType,
} from './types';

const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;
const SHUTDOWN_CHECK_INTERVAL_MS = 100;
/** Consecutive all-failed cycles before subscribers hear about it. */
const FAILED_CYCLES_BEFORE_STATUS = 2;
const STATUS_ERROR_LINES = 3;

export const FAILING_STATUS_MESSAGE = 'Bot is experiencing issues checking appointments';

export interface LocationCheckTime {
  id: string;
  name: string;
  checkedAt: string;
}

export interface MonitorSnapshot {
  running: boolean;
  intervalMinutes: number | null;
  lastResult: AggregateResult | null;
  seenLocationIds: string[];
  locationCheckTimes: LocationCheckTime[];
  consecutiveFailedCycles: number;
}

export interface AppointmentMonitorOptions {
  locations?: readonly Location[];
  shutdownTimeoutMs?: number;
}

/**
 * Runs poll cycles on an interval, owns the set of locations already
 * announced, and hands newly available locations to the notifier.
 *
 * One scheduled cycle runs at a time. Manual checks poll the same locations
 * but leave the seen set and the recorded check times alone.
 */
export class AppointmentMonitor extends EventEmitter {
  private readonly poller: LocationPoller;
  private readonly notifier: INotifier;
  private readonly locations: readonly Location[];
  private readonly shutdownTimeoutMs: number;

  private seen: ReadonlySet<string> = new Set();
  private lastResult: AggregateResult | null = null;
  private checkTimes: Map<string, LocationCheckTime> = new Map();
  private consecutiveFailedCycles = 0;

  private loopTimer: NodeJS.Timeout | null = null;
  private intervalMinutes: number | null = null;
  private cycleInFlight: Promise<CycleReport> | null = null;
  private manualCheckInFlight: Promise<AggregateResult> | null = null;
  private isShuttingDown = false;

  constructor(poller: LocationPoller, notifier: INotifier, options: AppointmentMonitorOptions = {}) {
    super();
    this.poller = poller;
    this.notifier = notifier;
    this.locations = options.locations ?? LOCATIONS;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
  }

  /**
   * Run a cycle now, then every `intervalMinutes`.
   */
  start(intervalMinutes: number): void {
    if (this.loopTimer || this.isShuttingDown) return;

    this.intervalMinutes = intervalMinutes;
    logger.info({ intervalMinutes, locations: this.locations.length }, 'appointment monitor started');

    this.tick();
    this.loopTimer = setInterval(() => this.tick(), intervalMinutes * 60_000);
  }

  /**
   * Run one scheduled cycle. A call while a cycle is running joins that cycle.
   */
  runCycle(): Promise<CycleReport> {
    if (!this.cycleInFlight) {
      this.cycleInFlight = this.executeCycle().finally(() => {
        this.cycleInFlight = null;
      });
    }
    return this.cycleInFlight;
  }

  /**
   * Poll every location without touching monitor state. Concurrent callers
   * share one in-flight check.
   */
  checkNow(): Promise<AggregateResult> {
    if (!this.manualCheckInFlight) {
      logger.info('manual check requested');
      this.manualCheckInFlight = this.poller.pollAll(this.locations).finally(() => {
        this.manualCheckInFlight = null;
      });
    }
    return this.manualCheckInFlight;
  }

  getSnapshot(): MonitorSnapshot {
    return {
      running: this.loopTimer !== null,
      intervalMinutes: this.intervalMinutes,
      lastResult: this.lastResult,
      seenLocationIds: Array.from(this.seen),
      locationCheckTimes: Array.from(this.checkTimes.values()),
      consecutiveFailedCycles: this.consecutiveFailedCycles,
    };
  }

  isCycleRunning(): boolean {
    return this.cycleInFlight !== null;
  }

  async shutdown(): Promise<void> {
    logger.info('shutting down appointment monitor');
    this.isShuttingDown = true;

    if (this.loopTimer) {
      clearInterval(this.loopTimer);
      this.loopTimer = null;
    }

    let waited = 0;
    while (this.cycleInFlight && waited < this.shutdownTimeoutMs) {
      await new Promise<void>(resolve => {
        const timer = setTimeout(resolve, SHUTDOWN_CHECK_INTERVAL_MS);
        timer.unref();
      });
      waited += SHUTDOWN_CHECK_INTERVAL_MS;
    }

    if (this.cycleInFlight) {
      logger.warn({ waitedMs: waited }, 'abandoning in-flight cycle');
    }

    this.removeAllListeners();
    logger.info('appointment monitor stopped');
  }

  private tick(): void {
    if (this.isShuttingDown) return;

    if (this.cycleInFlight) {
      logger.warn('previous cycle still running, skipping tick');
      return;
    }

    this.runCycle().catch(error => {
      logger.error({ err: error }, 'appointment cycle failed unexpectedly');
    });
  }

  private async executeCycle(): Promise<CycleReport> {
    logger.info('checking for appointments');
    const aggregate = await this.poller.pollAll(this.locations);
    this.lastResult = aggregate;
    this.recordCheckTimes(aggregate);

    const failures = aggregate.outcomes.filter(o => FAILED_POLL_STATUSES.has(o.status));
    if (failures.length > 0 && failures.length === aggregate.outcomes.length) {
      const errors = failures.map(o => `${o.locationName}: ${o.error ?? o.status}`);
      await this.handleFailedCycle(errors);
      return { aggregate, notified: [], failed: true };
    }

    this.consecutiveFailedCycles = 0;

    const { toNotify, newSeen } = detectChanges(this.seen, aggregate);
    const previousSize = this.seen.size;
    this.seen = newSeen;

    const notified: AvailableLocation[] = aggregate.outcomes
      .filter(o => toNotify.has(o.locationId))
      .map(o => ({ id: o.locationId, name: o.locationName, slotCount: o.slotCount }));

    if (notified.length > 0) {
      logger.info({ locations: notified.map(l => l.name) }, 'found appointments at new locations');
      this.emit(PollingEventType.SLOTS_NEW, notified);
      await this.deliver('availability', () => this.notifier.notify(notified));
    } else if (newSeen.size > 0) {
      logger.info({ count: newSeen.size }, 'appointments still available, already notified');
    } else if (previousSize > 0) {
      logger.info('no appointments available, cleared seen locations');
    } else {
      logger.info('no appointments available at any location');
    }

    const report: CycleReport = { aggregate, notified, failed: false };
    this.emit(PollingEventType.CYCLE_COMPLETE, report);
    return report;
  }

  /**
   * Every location failed: keep the seen set, and tell subscribers once the
   * failures persist.
   */
  private async handleFailedCycle(errors: string[]): Promise<void> {
    this.consecutiveFailedCycles++;
    const event: CycleFailedEvent = { consecutiveFailures: this.consecutiveFailedCycles, errors };

    logger.error(
      { consecutiveFailures: event.consecutiveFailures, errors: errors.slice(0, STATUS_ERROR_LINES) },
      'error checking appointments'
    );
    this.emit(PollingEventType.CYCLE_FAILED, event);

    if (this.consecutiveFailedCycles === FAILED_CYCLES_BEFORE_STATUS) {
      const detail = errors.slice(0, STATUS_ERROR_LINES).join('\n');
      await this.deliver('status', () => this.notifier.notifyStatus(FAILING_STATUS_MESSAGE, detail));
    }
  }

  /** Every location a cycle reached, whatever its outcome. */
  private recordCheckTimes(aggregate: AggregateResult): void {
    for (const outcome of aggregate.outcomes) {
      this.checkTimes.set(outcome.locationId, {
        id: outcome.locationId,
        name: outcome.locationName,
        checkedAt: outcome.checkedAt,
      });
    }
  }

  private async deliver(kind: string, send: () => Promise<void>): Promise<void> {
    try {
      await send();
    } catch (error) {
      logger.error({ err: error, kind }, 'failed to deliver notification');
    }
  }
}
