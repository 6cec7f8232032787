import { environment } from '../../../environments/environment';

export const PLAN_TRIP_PATH = 'plan_trip/';

export function getApiUrl(env: NodeJS.ProcessEnv = process.env): string {
  const url = (env.API_URL || '').trim() || environment.apiUrl;
  return url.endsWith('/') ? url : `${url}/`;
}

export function getPlanTripEndpoint(env: NodeJS.ProcessEnv = process.env): string {
  return `${getApiUrl(env)}${PLAN_TRIP_PATH}`;
}
