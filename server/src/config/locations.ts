/**
 * Fixed registry of the VHS offices that hold the citizenship test.
 *
 * `requestTemplate` selects how the availability URL is built. Treptow-Köpenick
 * is only reachable through the site's older single-provider URL.
 */
export type RequestTemplate = 'standard' | 'special';

export interface Location {
  readonly id: string;
  readonly displayName: string;
  readonly requestTemplate: RequestTemplate;
}

const REGISTRY: Location[] = [
  { id: '122671', displayName: 'Volkshochschule Treptow-Köpenick', requestTemplate: 'special' },
  { id: '325853', displayName: 'Volkshochschule City West', requestTemplate: 'standard' },
  { id: '351438', displayName: 'Volkshochschule Friedrichshain-Kreuzberg (Standort Friedrichshain)', requestTemplate: 'standard' },
  { id: '351444', displayName: 'Volkshochschule Friedrichshain-Kreuzberg (Standort Kreuzberg)', requestTemplate: 'standard' },
  { id: '122626', displayName: 'Volkshochschule Lichtenberg', requestTemplate: 'standard' },
  { id: '122628', displayName: 'Volkshochschule Marzahn-Hellersdorf', requestTemplate: 'standard' },
  { id: '351636', displayName: 'Volkshochschule Mitte - Antonstraße', requestTemplate: 'standard' },
  { id: '122659', displayName: 'Volkshochschule Neukölln', requestTemplate: 'standard' },
  { id: '122664', displayName: 'Volkshochschule Reinickendorf', requestTemplate: 'standard' },
  { id: '122666', displayName: 'Volkshochschule Spandau', requestTemplate: 'standard' },
  { id: '325987', displayName: 'Volkshochschule Steglitz-Zehlendorf - Goethestraße', requestTemplate: 'standard' },
  { id: '351435', displayName: 'Volkshochschule Tempelhof-Schöneberg', requestTemplate: 'standard' },
];

export const LOCATIONS: readonly Location[] = Object.freeze(REGISTRY.map(location => Object.freeze(location)));

/** Origin every availability request and relative redirect resolves against. */
export const BOOKING_BASE_URL = 'https://service.berlin.de';

/** Service id of "Einbürgerungstest" on the booking site. */
export const CITIZENSHIP_TEST_SERVICE_ID = '351180';

/** Public page subscribers are sent to for booking. */
export const BOOKING_PAGE_URL = `${BOOKING_BASE_URL}/dienstleistung/${CITIZENSHIP_TEST_SERVICE_ID}/`;

const TEMPLATES: Record<RequestTemplate, (locationId: string) => string> = {
  standard: (locationId) =>
    `/terminvereinbarung/termin/tag.php?termin=1&dienstleisterlist=${locationId}&anliegenlist=${CITIZENSHIP_TEST_SERVICE_ID}`,
  special: (locationId) =>
    `/terminvereinbarung/termin/tag.php?id=4067&anliegen%5b%5d=${CITIZENSHIP_TEST_SERVICE_ID}&termin=1&dienstleister=${locationId}&anliegen[]=${CITIZENSHIP_TEST_SERVICE_ID}`,
};

export function buildAvailabilityUrl(location: Location, baseUrl: string = BOOKING_BASE_URL): string {
  return baseUrl + TEMPLATES[location.requestTemplate](location.id);
}

/** Short label used in chat messages, e.g. "Treptow-Köpenick". */
export function shortLocationName(displayName: string): string {
  return displayName.replace(/^Volkshochschule\s+/, '');
}
