import { Location, buildAvailabilityUrl } from '../../config/locations';
import { HttpStatusError, PageParseError, sanitizeNetworkError } from '../../utils/errors';
import logger from '../../utils/logger';
import { AvailabilityClassifier } from './AvailabilityClassifier';
import { RedirectWalker } from './RedirectWalker';
import { AggregateResult, FAILED_POLL_STATUSES, PollOutcome } from './types';

export interface LocationPollerOptions {
  /** Locations checked at the same time. 1 checks them one after another. */
  concurrency?: number;
  /** Origin the availability URLs are built against. */
  baseUrl?: string;
}

/**
 * Checks every registered location once and aggregates the outcomes.
 * A failing location is recorded and skipped; it never ends the cycle.
 */
export class LocationPoller {
  private readonly walker: RedirectWalker;
  private readonly classifier: AvailabilityClassifier;
  private readonly concurrency: number;
  private readonly baseUrl?: string;

  constructor(
    walker?: RedirectWalker,
    classifier?: AvailabilityClassifier,
    options: LocationPollerOptions = {},
  ) {
    this.walker = walker || new RedirectWalker({ baseUrl: options.baseUrl });
    this.classifier = classifier || new AvailabilityClassifier();
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.baseUrl = options.baseUrl;
  }

  async pollAll(locations: readonly Location[]): Promise<AggregateResult> {
    const outcomes = new Array<PollOutcome>(locations.length);
    let next = 0;

    // Each worker claims the next unchecked index; outcomes keep registry order
    const worker = async (): Promise<void> => {
      while (next < locations.length) {
        const index = next++;
        outcomes[index] = await this.pollLocation(locations[index]);
      }
    };

    const workerCount = Math.min(this.concurrency, locations.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const failed = outcomes.filter(o => FAILED_POLL_STATUSES.has(o.status));
    const totalAvailable = outcomes.filter(o => o.status === 'available').length;

    logger.info(
      { locations: outcomes.length, available: totalAvailable, failed: failed.length },
      'poll cycle finished'
    );

    return {
      outcomes,
      overallStatus: failed.length === 0 ? 'success' : 'partial_success',
      checkedAt: new Date().toISOString(),
      totalAvailable,
    };
  }

  async pollLocation(location: Location): Promise<PollOutcome> {
    const base = { locationId: location.id, locationName: location.displayName };
    logger.info({ location: location.displayName }, 'checking location');

    try {
      const url = buildAvailabilityUrl(location, this.baseUrl);
      const walk = await this.walker.follow(url);
      const checkedAt = new Date().toISOString();

      if (!walk.ok) {
        return { ...base, status: 'network_error', slotCount: 0, checkedAt, error: walk.error.message };
      }

      const { response } = walk;
      if (response.status !== 200) {
        const failure = new HttpStatusError(response.status);
        logger.warn({ location: location.displayName, status: failure.httpStatus }, 'unexpected HTTP status');
        return {
          ...base,
          status: 'http_error',
          slotCount: 0,
          checkedAt,
          error: failure.message,
          httpStatus: failure.httpStatus,
        };
      }

      const classification = this.classifier.classify(response.url, response.body);

      if (classification.status === 'parse_error') {
        const failure = new PageParseError(classification.error ?? 'availability page could not be parsed');
        logger.warn({ location: location.displayName, err: failure }, 'unparseable availability page');
        return { ...base, status: 'parse_error', slotCount: 0, checkedAt, error: failure.message, reason: 'parse_error' };
      }

      if (classification.status === 'available') {
        logger.info({ location: location.displayName, slots: classification.slotCount }, 'found bookable days');
      }

      return {
        ...base,
        status: classification.status,
        slotCount: classification.slotCount,
        checkedAt,
        reason: classification.reason,
      };
    } catch (error) {
      const message = sanitizeNetworkError(error);
      logger.error({ location: location.displayName, error: message }, 'error checking location');
      return { ...base, status: 'network_error', slotCount: 0, checkedAt: new Date().toISOString(), error: message };
    }
  }
}
