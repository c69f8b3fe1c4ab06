export interface Coordinates {
  lat: number;
  lon: number;
}

export type AgeGroupKey = 'infant' | 'toddler' | 'preschool' | 'kindergarten' | 'schoolAge';

export interface AgeGroup {
  key: AgeGroupKey;
  label: string;
  minMonths: number;
  /** Exclusive; `null` for the open-ended school-age bracket. */
  maxMonths: number | null;
}

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export type SpacesByAgeGroup = Record<AgeGroupKey, number | null>;

export interface FacilityEnrichment {
  website: string | null;
  googleRating: number | null;
  googleReviewsCount: number | null;
  googleMapsUrl: string | null;
}

export interface FacilityRecord extends FacilityEnrichment {
  id: string;
  name: string;
  address: string;
  postalCode: string;
  phone: string;
  /** Raw GeoJSON text from the dataset's geometry column. */
  geometry: string;
  spaces: SpacesByAgeGroup;
  totalSpaces: number;
  subsidy: boolean;
  cwelcc: boolean;
}

export interface TravelTimes {
  walk: string;
  transit: string;
  drive: string;
}

export interface DaycareResult extends FacilityEnrichment {
  id: string;
  name: string;
  address: string;
  postalCode: string;
  phone: string;
  distanceKm: number;
  capacity: number;
  totalSpaces: number;
  subsidy: boolean;
  cwelcc: boolean;
  ageGroupLabel: string;
  lat: number;
  lon: number;
  infantSpaces: number;
  toddlerSpaces: number;
  preschoolSpaces: number;
  kindergartenSpaces: number;
  schoolAgeSpaces: number;
  walkTime: string | null;
  transitTime: string | null;
  driveTime: string | null;
}

export interface SearchStats {
  total: number;
  walkingDistance: number;
  cwelccCount: number;
  cwelccPercent: number;
  subsidyCount: number;
  subsidyPercent: number;
  totalSpaces: number;
}

export interface SearchArgs {
  address?: string | null;
  birthday?: string | null;
  startDate?: string | null;
}

export interface SearchInput {
  address: string;
  birthday: string;
  startDate: string;
}

export type SearchOutcome =
  | {
      status: 'ok';
      input: SearchInput;
      results: DaycareResult[];
      ageDisplay: string;
      ageGroup: AgeGroup;
      stats: SearchStats;
      radiusKm: number;
      userLat: number;
      userLon: number;
    }
  | { status: 'invalid' | 'not_found' | 'unavailable' | 'error'; input: SearchInput; errors: string[] };

/** The subset of a search result that the shortlist email shows; clients may send whole results. */
export interface ShortlistDaycare {
  name: string;
  address?: string | null;
  postalCode?: string | null;
  distanceKm?: number | null;
  phone?: string | null;
  website?: string | null;
  googleRating?: number | null;
  googleReviewsCount?: number | null;
  cwelcc?: boolean | null;
  subsidy?: boolean | null;
}

export interface ShortlistArgs {
  email: string;
  daycares: ShortlistDaycare[];
  address: string;
}

export type ShortlistOutcome =
  | { status: 'sent' }
  | { status: 'rejected'; error: string }
  | { status: 'failed'; error: string };

export interface EmailMessage {
  to: string;
  subject: string;
  text: string;
  html: string;
}

export interface Geocoder {
  geocode(address: string, signal?: AbortSignal): Promise<Coordinates | null>;
}

export interface TravelTimeProvider {
  travelTimes(origin: Coordinates, destinations: Coordinates[], signal?: AbortSignal): Promise<TravelTimes[]>;
}

export interface Mailer {
  send(message: EmailMessage): Promise<boolean>;
}

export interface ServiceConfig {
  port: number;
  dataDir: string;
  datasetPrefix: string;
  supplementaryFile: string;
  googleMapsApiKey: string | null;
  googleMapsBaseUrl: string;
  sendgridApiKey: string | null;
  sendgridBaseUrl: string;
  fromEmail: string;
  targetCity: string;
  targetRegion: string;
  requestTimeoutMs: number;
  overallTimeoutMs: number;
}
