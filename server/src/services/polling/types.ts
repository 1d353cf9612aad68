import type { NetworkError } from '../../utils/errors';

/** Final (non-followed) response of a redirect chain. */
export interface FinalResponse {
  status: number;
  /** URL the final response was served from, after all followed redirects. */
  url: string;
  body: string;
  /** Number of redirects followed before this response. */
  redirects: number;
  maxRedirectsReached: boolean;
}

export type WalkResult =
  | { ok: true; response: FinalResponse }
  | { ok: false; error: NetworkError };

export type ClassificationStatus = 'available' | 'no_slots' | 'parse_error';

/**
 * Which branch of the classifier produced the result. `no_evidence` and
 * `no_appointments_indicator` both mean no slots, but `no_evidence` is the one
 * to watch for markup drift on the booking site.
 */
export type ClassificationReason =
  | 'terminal_page'
  | 'bookable_cells'
  | 'no_appointments_indicator'
  | 'no_evidence'
  | 'parse_error';

export interface ClassificationResult {
  status: ClassificationStatus;
  slotCount: number;
  reason: ClassificationReason;
  error?: string;
}

export type PollStatus = 'available' | 'no_slots' | 'http_error' | 'parse_error' | 'network_error';

export const FAILED_POLL_STATUSES: ReadonlySet<PollStatus> = new Set<PollStatus>([
  'http_error',
  'parse_error',
  'network_error',
]);

export interface PollOutcome {
  locationId: string;
  locationName: string;
  status: PollStatus;
  /** 0 unless status is 'available'. */
  slotCount: number;
  checkedAt: string;
  error?: string;
  reason?: ClassificationReason;
  httpStatus?: number;
}

export type OverallStatus = 'success' | 'partial_success';

export interface AggregateResult {
  outcomes: PollOutcome[];
  overallStatus: OverallStatus;
  checkedAt: string;
  totalAvailable: number;
}

export interface ChangeDetection {
  toNotify: Set<string>;
  newSeen: Set<string>;
}

export interface AvailableLocation {
  id: string;
  name: string;
  slotCount: number;
}

export interface CycleReport {
  aggregate: AggregateResult;
  notified: AvailableLocation[];
  /** True when every location failed and SeenState was left untouched. */
  failed: boolean;
}

export interface CycleFailedEvent {
  consecutiveFailures: number;
  errors: string[];
}

export enum PollingEventType {
  CYCLE_COMPLETE = 'cycle:complete',
  SLOTS_NEW = 'slots:new',
  CYCLE_FAILED = 'cycle:failed',
}
