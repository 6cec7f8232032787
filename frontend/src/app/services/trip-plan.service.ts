import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { environment } from '../../environments/environment';
import { getPlanTripEndpoint } from '../core/services/runtime-config';

export type BudgetLevel = 1 | 2 | 3;

export const BUDGET_OPTIONS: ReadonlyArray<{ level: BudgetLevel; label: string }> = [
  { level: 1, label: 'Budget-Friendly' },
  { level: 2, label: 'Mid-Range' },
  { level: 3, label: 'Luxury' }
];

export interface TripForm {
  source: string;
  destination: string;
  startDate: string;
  endDate?: string; // defaults to a week after startDate
  budgetLevel: BudgetLevel;
}

export interface TripPlanPayload {
  source: string;
  destination: string;
  start_date: string;
  end_date: string;
  budget_level: BudgetLevel;
}

export interface TripPlanResponse {
  flight_suggestions: string;
  itinerary: string;
  recommendations: string;
  weather_forecast: string;
}

export class TripPlanError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TripPlanError';
  }
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DEFAULT_TRIP_DAYS = 7;

const pad = (value: number): string => String(value).padStart(2, '0');

export function toIsoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function addDays(isoDate: string, days: number): string {
  const date = new Date(`${isoDate}T00:00:00Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}

const isIsoDate = (value: string): boolean => {
  if (!DATE_PATTERN.test(value)) {
    return false;
  }
  const date = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
};

/**
 * Form-level checks the backend leaves to its callers: both cities present,
 * a start date no earlier than today, and an end date no earlier than the start.
 */
export function validateTripForm(form: TripForm, today: string = toIsoDate(new Date())): string[] {
  const errors: string[] = [];

  if (!form.source.trim() || !form.destination.trim()) {
    errors.push('Please provide both departure city and destination!');
  }

  if (!isIsoDate(form.startDate)) {
    errors.push('Start date must be a valid YYYY-MM-DD date');
    return errors;
  }
  if (form.startDate < today) {
    errors.push('Start date cannot be in the past');
  }

  if (form.endDate !== undefined) {
    if (!isIsoDate(form.endDate)) {
      errors.push('End date must be a valid YYYY-MM-DD date');
    } else if (form.endDate < form.startDate) {
      errors.push('End date cannot be before the start date');
    }
  }

  return errors;
}

export function buildPayload(form: TripForm): TripPlanPayload {
  return {
    source: form.source.trim(),
    destination: form.destination.trim(),
    start_date: form.startDate,
    end_date: form.endDate ?? addDays(form.startDate, DEFAULT_TRIP_DAYS),
    budget_level: form.budgetLevel
  };
}

const describeBody = (data: unknown): string =>
  typeof data === 'string' ? data : JSON.stringify(data);

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toTripPlanResponse = (data: unknown): TripPlanResponse | null => {
  if (!isRecord(data)) {
    return null;
  }

  const { flight_suggestions, itinerary, recommendations, weather_forecast } = data;
  if (
    typeof flight_suggestions !== 'string' ||
    typeof itinerary !== 'string' ||
    typeof recommendations !== 'string' ||
    typeof weather_forecast !== 'string'
  ) {
    return null;
  }

  return { flight_suggestions, itinerary, recommendations, weather_forecast };
};

export class TripPlanService {
  constructor(
    private readonly http: Pick<AxiosInstance, 'post'> = axios,
    private readonly endpoint: string = getPlanTripEndpoint()
  ) {}

  get apiEndpoint(): string {
    return this.endpoint;
  }

  async planTrip(form: TripForm): Promise<TripPlanResponse> {
    const payload = buildPayload(form);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(this.endpoint, payload, {
        timeout: environment.requestTimeoutMs,
        validateStatus: () => true
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TripPlanError(
        `Error connecting to the API at ${this.endpoint}. Make sure the trip planner server is running. Error: ${reason}`
      );
    }

    if (response.status !== 200) {
      throw new TripPlanError(`Error: ${response.status} - ${describeBody(response.data)}`);
    }

    const plan = toTripPlanResponse(response.data);
    if (!plan) {
      throw new TripPlanError(`Unexpected response from ${this.endpoint}: ${describeBody(response.data)}`);
    }
    return plan;
  }
}
