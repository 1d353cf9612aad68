export { AppointmentMonitor, FAILING_STATUS_MESSAGE } from './AppointmentMonitor';
export { LocationPoller } from './LocationPoller';
export { RedirectWalker, MAX_REDIRECTS, SESSION_COOKIE_NAME } from './RedirectWalker';
export { AvailabilityClassifier } from './AvailabilityClassifier';
export { detectChanges } from './ChangeDetector';
export type { MonitorSnapshot, LocationCheckTime, AppointmentMonitorOptions } from './AppointmentMonitor';
export type { LocationPollerOptions } from './LocationPoller';
export type { RedirectWalkerOptions } from './RedirectWalker';
export * from './types';
