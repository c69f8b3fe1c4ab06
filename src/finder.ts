import AjvModule, { type ErrorObject, type JSONSchemaType } from 'ajv';
import addFormatsModule from 'ajv-formats';
import { ageBracket, ageInMonths, formatAge, formatIsoDate, isAfter, parseIsoDate, toCalendarDate } from './age.js';
import { loadFacilities, type DatasetConfig } from './dataset.js';
import { buildShortlistEmail } from './email.js';
import { InvalidInputError, UpstreamServiceError } from './errors.js';
import { UNAVAILABLE } from './google.js';
import { errorMessage, logger, type Logger } from './log.js';
import { applyTravelTimes, findNearbyDaycares, SEARCH_RADIUS_KM, TRAVEL_TIME_LIMIT } from './search.js';
import { calculateStats } from './stats.js';
import type {
  CalendarDate,
  Coordinates,
  DaycareResult,
  FacilityRecord,
  Geocoder,
  Mailer,
  SearchArgs,
  SearchInput,
  SearchOutcome,
  ServiceConfig,
  ShortlistArgs,
  ShortlistDaycare,
  ShortlistOutcome,
  TravelTimeProvider,
  TravelTimes
} from './types.js';

// ajv and ajv-formats are CommonJS; under NodeNext their classes sit on `.default`.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

export const MESSAGES = {
  addressRequired: 'Please enter an address',
  birthdayRequired: "Please enter your child's birthday",
  invalidBirthday: 'Invalid date format',
  invalidStartDate: 'Invalid start date format',
  birthdayAfterStart: 'Birthday cannot be after the start date',
  addressNotFound: 'Could not find that address. Please try a more specific address.',
  lookupUnavailable: 'Address lookup is unavailable right now. Please try again later.',
  searchFailed: 'Something went wrong while searching daycares. Please try again.',
  invalidEmail: 'Please enter a valid email address',
  emptyShortlist: 'Please select at least one daycare',
  deliveryFailed: 'Failed to send email. Please try again later.'
} as const;

const MAX_SHORTLIST_SIZE = 50;

const searchSchema: JSONSchemaType<SearchArgs> = {
  type: 'object',
  required: [],
  additionalProperties: false,
  properties: {
    address: { type: 'string', nullable: true, maxLength: 300 },
    birthday: { type: 'string', nullable: true, maxLength: 20 },
    startDate: { type: 'string', nullable: true, maxLength: 20 }
  }
};

const shortlistDaycareSchema: JSONSchemaType<ShortlistDaycare> = {
  type: 'object',
  required: ['name'],
  additionalProperties: true,
  properties: {
    name: { type: 'string' },
    address: { type: 'string', nullable: true },
    postalCode: { type: 'string', nullable: true },
    distanceKm: { type: 'number', nullable: true },
    phone: { type: 'string', nullable: true },
    website: { type: 'string', nullable: true },
    googleRating: { type: 'number', nullable: true },
    googleReviewsCount: { type: 'integer', nullable: true },
    cwelcc: { type: 'boolean', nullable: true },
    subsidy: { type: 'boolean', nullable: true }
  }
};

const shortlistSchema: JSONSchemaType<ShortlistArgs> = {
  type: 'object',
  required: ['email', 'daycares', 'address'],
  additionalProperties: false,
  properties: {
    email: { type: 'string' },
    address: { type: 'string', maxLength: 300 },
    daycares: { type: 'array', maxItems: MAX_SHORTLIST_SIZE, items: shortlistDaycareSchema }
  }
};

const ajv = new Ajv({ allErrors: true, strict: true });
addFormats(ajv);

const validateSearch = ajv.compile(searchSchema);
const validateShortlist = ajv.compile(shortlistSchema);
const isEmail = ajv.compile<string>({ type: 'string', format: 'email' });

/**
 * Turns Ajv errors into readable messages such as `"birthday must be string"`.
 */
export function describeSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((error) => {
    const field = error.instancePath.replace(/^\//, '').replace(/\//g, '.') || 'request';
    if (error.keyword === 'additionalProperties') {
      return `Unknown field: ${String(error.params.additionalProperty)}`;
    }
    return `${field} ${error.message ?? 'is invalid'}`;
  });
}

function echoInput(rawArgs: unknown): SearchInput {
  const record = typeof rawArgs === 'object' && rawArgs !== null ? (rawArgs as Record<string, unknown>) : {};
  const text = (value: unknown): string => (typeof value === 'string' ? value.trim() : '');
  return { address: text(record.address), birthday: text(record.birthday), startDate: text(record.startDate) };
}

interface ValidatedSearch {
  input: SearchInput;
  birthday: CalendarDate;
  reference: CalendarDate;
}

function validateSearchInput(input: SearchInput, today: CalendarDate): ValidatedSearch | string[] {
  const errors: string[] = [];

  if (!input.address) {
    errors.push(MESSAGES.addressRequired);
  }

  let birthday: CalendarDate | null = null;
  if (!input.birthday) {
    errors.push(MESSAGES.birthdayRequired);
  } else {
    birthday = parseIsoDate(input.birthday);
    if (!birthday) {
      errors.push(MESSAGES.invalidBirthday);
    }
  }

  let reference: CalendarDate | null = today;
  if (input.startDate) {
    reference = parseIsoDate(input.startDate);
    if (!reference) {
      errors.push(MESSAGES.invalidStartDate);
    }
  }

  if (birthday && reference && isAfter(birthday, reference)) {
    errors.push(MESSAGES.birthdayAfterStart);
  }

  if (errors.length > 0 || !birthday || !reference) {
    return errors;
  }
  return { input, birthday, reference };
}

export interface DaycareFinderDeps {
  config: Pick<ServiceConfig, 'overallTimeoutMs'> & DatasetConfig;
  geocoder: Geocoder;
  travelTimes: TravelTimeProvider;
  mailer: Mailer;
  log?: Logger;
  /** Clock used when no start date is given. */
  now?: () => Date;
  /** Dataset source; defaults to reading the newest snapshot from `config.dataDir`. */
  loadFacilities?: (config: DatasetConfig, log: Logger) => Promise<FacilityRecord[]>;
}

export class DaycareFinder {
  private readonly config: DaycareFinderDeps['config'];
  private readonly geocoder: Geocoder;
  private readonly travelTimeProvider: TravelTimeProvider;
  private readonly mailer: Mailer;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly load: (config: DatasetConfig, log: Logger) => Promise<FacilityRecord[]>;

  constructor(deps: DaycareFinderDeps) {
    this.config = deps.config;
    this.geocoder = deps.geocoder;
    this.travelTimeProvider = deps.travelTimes;
    this.mailer = deps.mailer;
    this.log = deps.log ?? logger;
    this.now = deps.now ?? (() => new Date());
    this.load = deps.loadFacilities ?? loadFacilities;
  }

  /**
   * Finds daycares near an address with open spaces for the child's age group.
   * Every failure comes back as an outcome that echoes the submitted input.
   */
  async search(rawArgs: unknown): Promise<SearchOutcome> {
    if (!validateSearch(rawArgs)) {
      const errors = describeSchemaErrors(validateSearch.errors);
      this.log.warn('Search input validation failed', { errors });
      return { status: 'invalid', input: echoInput(rawArgs), errors };
    }

    const today = toCalendarDate(this.now());
    const validated = validateSearchInput(echoInput(rawArgs), today);
    if (Array.isArray(validated)) {
      return { status: 'invalid', input: echoInput(rawArgs), errors: validated };
    }

    const { birthday, reference } = validated;
    const input: SearchInput = { ...validated.input, startDate: validated.input.startDate || formatIsoDate(reference) };

    const controller = new AbortController();
    const timeout = setTimeout(() => {
      const reason = new Error('Search timed out');
      reason.name = 'AbortError';
      controller.abort(reason);
    }, this.config.overallTimeoutMs);

    try {
      let origin: Coordinates | null;
      try {
        origin = await this.geocoder.geocode(input.address, controller.signal);
      } catch (error) {
        const upstream = error instanceof UpstreamServiceError ? error.service : undefined;
        this.log.error('Address lookup failed', { upstream, error: errorMessage(error) });
        return { status: 'unavailable', input, errors: [MESSAGES.lookupUnavailable] };
      }
      if (!origin) {
        this.log.info('Address not found');
        return { status: 'not_found', input, errors: [MESSAGES.addressNotFound] };
      }

      const ageGroup = ageBracket(birthday, reference);
      let results: DaycareResult[];
      try {
        const facilities = await this.load(this.config, this.log);
        results = findNearbyDaycares(origin, facilities, ageGroup, SEARCH_RADIUS_KM);
      } catch (error) {
        this.log.error('Daycare search failed', { error: errorMessage(error) });
        return { status: 'error', input, errors: [MESSAGES.searchFailed] };
      }

      results = applyTravelTimes(results, await this.annotate(origin, results, controller.signal));

      const stats = calculateStats(results);
      this.log.info('Completed daycare search', { ageGroup: ageGroup.key, count: results.length });

      return {
        status: 'ok',
        input,
        results,
        ageDisplay: formatAge(ageInMonths(birthday, reference)),
        ageGroup,
        stats,
        radiusKm: SEARCH_RADIUS_KM,
        userLat: origin.lat,
        userLon: origin.lon
      };
    } finally {
      clearTimeout(timeout);
    }
  }

  private async annotate(
    origin: { lat: number; lon: number },
    results: DaycareResult[],
    signal: AbortSignal
  ): Promise<TravelTimes[]> {
    const nearest = results.slice(0, TRAVEL_TIME_LIMIT);
    if (nearest.length === 0) {
      return [];
    }
    const destinations = nearest.map(({ lat, lon }) => ({ lat, lon }));
    try {
      return await this.travelTimeProvider.travelTimes(origin, destinations, signal);
    } catch (error) {
      this.log.warn('Travel times unavailable', { error: errorMessage(error) });
      return nearest.map(() => ({ walk: UNAVAILABLE, transit: UNAVAILABLE, drive: UNAVAILABLE }));
    }
  }

  /**
   * Emails a shortlist of daycares to the caregiver.
   * A body that does not match the schema throws `InvalidInputError`.
   */
  async sendShortlist(rawArgs: unknown): Promise<ShortlistOutcome> {
    if (!validateShortlist(rawArgs)) {
      throw new InvalidInputError(describeSchemaErrors(validateShortlist.errors));
    }

    const email = rawArgs.email.trim();
    if (!isEmail(email)) {
      return { status: 'rejected', error: MESSAGES.invalidEmail };
    }
    if (rawArgs.daycares.length === 0) {
      return { status: 'rejected', error: MESSAGES.emptyShortlist };
    }

    const message = buildShortlistEmail(email, rawArgs.daycares, rawArgs.address.trim());
    const sent = await this.mailer.send(message);
    if (!sent) {
      return { status: 'failed', error: MESSAGES.deliveryFailed };
    }

    this.log.info('Sent shortlist email', { count: rawArgs.daycares.length });
    return { status: 'sent' };
  }
}
