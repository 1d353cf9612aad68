import { Request, Response } from 'express';
import { MonitorView, SubscriberCount } from '../types';

export function getStatus(monitor: MonitorView, subscribers: SubscriberCount) {
  return (_req: Request, res: Response): void => {
    const snapshot = monitor.getSnapshot();

    res.json({
      running: snapshot.running,
      intervalMinutes: snapshot.intervalMinutes,
      cycleInProgress: monitor.isCycleRunning(),
      consecutiveFailedCycles: snapshot.consecutiveFailedCycles,
      subscriberCount: subscribers.size,
      seenLocationIds: snapshot.seenLocationIds,
      locationCheckTimes: snapshot.locationCheckTimes,
      lastResult: snapshot.lastResult,
    });
  };
}
