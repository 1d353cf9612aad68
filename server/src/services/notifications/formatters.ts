import { BOOKING_PAGE_URL, Location, shortLocationName } from '../../config/locations';
import { AggregateResult, AvailableLocation, FAILED_POLL_STATUSES } from '../polling/types';

const MAX_NAME_LENGTH = 30;

export interface LocationCheckTime {
  name: string;
  checkedAt: string;
}

export interface StatusReportInput {
  subscribed: boolean;
  subscriberCount: number;
  intervalMinutes: number;
  checkTimes: LocationCheckTime[];
  now?: Date;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Markdown message announcing newly available locations.
 */
export function formatAvailabilityMessage(locations: AvailableLocation[]): string {
  const sorted = [...locations].sort((a, b) => a.name.localeCompare(b.name));
  const lines = [
    '🎉 *Neue Termine verfügbar! / New Appointments Available!*',
    '',
    `Appointments available at ${plural(sorted.length, 'location')}:`,
    '',
    ...sorted.map(l => `✅ *${l.name}* (${plural(l.slotCount, 'bookable day')})`),
    '',
    '📝 *How to book:*',
    `1. Go to: ${BOOKING_PAGE_URL}`,
    '2. Find the Volkshochschule location mentioned above',
    "3. Click 'An diesem Standort einen Termin buchen'",
    '4. Select your appointment date',
    '',
    "⏰ *Book quickly before they're gone!*",
  ];
  return lines.join('\n');
}

export function formatStatusUpdate(status: string, error?: string): string {
  if (error) {
    return `⚠️ Bot Status Update:\n${status}\nError: ${error}`;
  }
  return `ℹ️ Bot Status Update:\n${status}`;
}

/**
 * Plain-text reply to a manual check. Every location that could not be
 * checked is listed with its error.
 */
export function formatManualCheckReport(result: AggregateResult): string {
  const available = result.outcomes.filter(o => o.status === 'available');
  const failed = result.outcomes.filter(o => FAILED_POLL_STATUSES.has(o.status));

  const sections: string[] = [];

  if (available.length > 0) {
    const totalDays = available.reduce((sum, o) => sum + o.slotCount, 0);
    sections.push([
      `✅ Found ${plural(totalDays, 'bookable day')} at ${plural(available.length, 'location')}:`,
      '',
      ...available.map(o => `📍 ${shortLocationName(o.locationName)}: ${plural(o.slotCount, 'day')}`),
      '',
      `📝 Visit ${BOOKING_PAGE_URL} to book`,
    ].join('\n'));
  } else {
    sections.push('❌ No appointments currently available at any VHS location');
  }

  if (failed.length > 0) {
    sections.push([
      '⚠️ Some locations could not be checked:',
      ...failed.map(o => `• ${o.locationName}: ${o.error ?? o.status}`),
    ].join('\n'));
  }

  return sections.join('\n\n');
}

export function formatAgo(seconds: number): string {
  const s = Math.max(0, Math.floor(seconds));
  if (s < 60) return `${s}s ago`;
  if (s < 3600) return `${Math.floor(s / 60)}m ago`;
  return `${Math.floor(s / 3600)}h ago`;
}

export function truncateName(name: string): string {
  return name.length > MAX_NAME_LENGTH ? `${name.slice(0, MAX_NAME_LENGTH)}...` : name;
}

/**
 * Markdown reply to /status.
 */
export function formatStatusReport(input: StatusReportInput): string {
  if (!input.subscribed) {
    return [
      '📊 *Status*',
      '❌ Not subscribed to notifications',
      'Use /subscribe to start receiving notifications',
    ].join('\n');
  }

  const lines = [
    '📊 *Status*',
    '✅ Subscribed to notifications',
    `👥 Total subscribers: ${input.subscriberCount}`,
    `🔄 Checking every ${plural(input.intervalMinutes, 'minute')}`,
    '',
  ];

  if (input.checkTimes.length === 0) {
    lines.push('_No checks completed yet_');
    return lines.join('\n');
  }

  const now = (input.now ?? new Date()).getTime();
  lines.push('*Last checked:*');
  for (const { name, checkedAt } of [...input.checkTimes].sort((a, b) => a.name.localeCompare(b.name))) {
    const checked = Date.parse(checkedAt);
    if (Number.isNaN(checked)) continue;
    lines.push(`• ${truncateName(name)}: ${formatAgo((now - checked) / 1000)}`);
  }
  return lines.join('\n');
}

export const WELCOME_MESSAGE = [
  '🤖 Welcome to the Einbürgerungstest Appointment Bot!',
  '',
  'I will notify you when new appointments become available.',
  '',
  'Commands:',
  '/subscribe - Subscribe to notifications',
  '/unsubscribe - Unsubscribe from notifications',
  '/status - Check subscription status',
  '/check - Manually check for appointments',
  '/help - Show detailed help information',
].join('\n');

export function formatHelpMessage(intervalMinutes: number, locations: readonly Location[]): string {
  const names = Array.from(new Set(locations.map(l => shortLocationName(l.displayName))));
  return [
    '📚 *Einbürgerungstest Bot Help*',
    '',
    '*What this bot does:*',
    `• Checks all ${locations.length} VHS locations in Berlin every ${plural(intervalMinutes, 'minute')}`,
    '• Notifies you when appointments become available',
    '• Shows which VHS locations have slots',
    '',
    '*Commands:*',
    '`/subscribe` - Start receiving notifications',
    '`/unsubscribe` - Stop receiving notifications',
    "`/status` - Shows if you're subscribed and when each location was last checked",
    '`/check` - Manually check all locations right now',
    '`/help` - Show this help message',
    '',
    '*How to book when notified:*',
    '1. Go to the booking page',
    '2. Find the VHS location from the notification',
    "3. Click 'An diesem Standort einen Termin buchen'",
    '4. Select your appointment',
    '',
    '*Locations monitored:*',
    ...names.map(name => `• ${name}`),
    '',
    '⚡ *Tip:* Appointments go fast! Book immediately when notified.',
  ].join('\n');
}
