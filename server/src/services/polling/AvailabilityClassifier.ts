import * as cheerio from 'cheerio';
import logger from '../../utils/logger';
import { ClassificationResult } from './types';

/**
 * Markers the classifier looks for on the booking site's calendar pages.
 * Adjust these when the site's markup changes; the classification steps
 * themselves stay the same.
 */
export interface ClassifierPolicy {
  /** Path fragments of pages the site redirects to when nothing is bookable. */
  terminalPathMarkers: readonly string[];
  calendarContainerSelector: string;
  /** Bookable cells inside the calendar container. */
  bookableCellSelector: string;
  /** Used when no calendar container is present. */
  fallbackCellSelector: string;
  /** Alert blocks the site shows when there are no appointments. */
  noAppointmentsSelector: string;
  /** Lower-case tokens that together mark a "keine Termine" text. */
  noneToken: string;
  appointmentToken: string;
}

export const DEFAULT_CLASSIFIER_POLICY: Readonly<ClassifierPolicy> = Object.freeze({
  terminalPathMarkers: ['/terminvereinbarung/termin/stop/', '/terminvereinbarung/termin/taken/'],
  calendarContainerSelector: 'div.calendar-month-table',
  bookableCellSelector: 'td.buchbar',
  fallbackCellSelector: 'td.buchbar, a.buchbar, td.calendar-week-day, a.calendar-week-day',
  noAppointmentsSelector: 'div.alert-warning, div.alert',
  noneToken: 'keine',
  appointmentToken: 'termin',
});

const TEXT_NODE = 3;

/**
 * Decides from the final page of a redirect chain whether a location has
 * bookable days. Heuristic by nature: anything it cannot positively identify
 * as availability is reported as no slots.
 */
export class AvailabilityClassifier {
  private readonly policy: Readonly<ClassifierPolicy>;

  constructor(policy: Partial<ClassifierPolicy> = {}) {
    this.policy = { ...DEFAULT_CLASSIFIER_POLICY, ...policy };
  }

  classify(finalUrl: string, html: string): ClassificationResult {
    if (this.isTerminalPage(finalUrl)) {
      return { status: 'no_slots', slotCount: 0, reason: 'terminal_page' };
    }

    try {
      const $ = cheerio.load(html);

      const slotCount = this.countBookableCells($);
      if (slotCount > 0) {
        return { status: 'available', slotCount, reason: 'bookable_cells' };
      }

      if (this.hasNoAppointmentsIndicator($)) {
        return { status: 'no_slots', slotCount: 0, reason: 'no_appointments_indicator' };
      }

      logger.debug({ url: finalUrl }, 'no availability markers found on page');
      return { status: 'no_slots', slotCount: 0, reason: 'no_evidence' };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ url: finalUrl, error: message }, 'failed to parse availability page');
      return { status: 'parse_error', slotCount: 0, reason: 'parse_error', error: message };
    }
  }

  private isTerminalPage(finalUrl: string): boolean {
    const path = AvailabilityClassifier.getPath(finalUrl);
    return this.policy.terminalPathMarkers.some(marker => path.includes(marker));
  }

  /**
   * Path of an absolute URL, or the raw string when it does not parse.
   */
  static getPath(url: string): string {
    try {
      return new URL(url).pathname;
    } catch {
      return url;
    }
  }

  private countBookableCells($: cheerio.CheerioAPI): number {
    const container = $(this.policy.calendarContainerSelector);
    if (container.length > 0) {
      return container.find(this.policy.bookableCellSelector).length;
    }
    return $(this.policy.fallbackCellSelector).length;
  }

  private hasNoAppointmentsIndicator($: cheerio.CheerioAPI): boolean {
    if ($(this.policy.noAppointmentsSelector).length > 0) {
      return true;
    }

    const { noneToken, appointmentToken } = this.policy;
    return $('*')
      .contents()
      .toArray()
      .some(node => {
        if (node.nodeType !== TEXT_NODE) return false;
        const text = $(node).text().toLowerCase();
        return text.includes(noneToken) && text.includes(appointmentToken);
      });
  }
}
