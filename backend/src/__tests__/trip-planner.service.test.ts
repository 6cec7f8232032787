// ============================================
// TRIP PLANNER TESTS
// ============================================
// Orchestration of the four generation tasks against fake backends

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AppError } from '../middleware/error.middleware';
import { type BackendReply, type BackendRequest, GenerationClient } from '../services/generation.service';
import { NOT_CONFIGURED_MESSAGE, TripPlannerService } from '../services/trip-planner.service';
import {
  CONFIGURED,
  FakeBackend,
  NOT_CONFIGURED,
  PROMPT_MARKERS,
  createTripRequest,
  echoPrompt
} from './mock-factories';
import type { PlanExecution } from '../config/app.config';

function createPlanner(backend: FakeBackend, execution: PlanExecution = 'parallel') {
  return new TripPlannerService(new GenerationClient(CONFIGURED, backend), execution);
}

describe('TripPlannerService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('fails the whole request with 503 before any generation when not configured', async () => {
    const backend = new FakeBackend();
    const planner = new TripPlannerService(new GenerationClient(NOT_CONFIGURED, backend));

    const error = await planner.planTrip(createTripRequest()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ statusCode: 503, message: NOT_CONFIGURED_MESSAGE });
    expect(backend.calls).toHaveLength(0);
  });

  it('references the destination in every section and the inclusive duration in the itinerary', async () => {
    const plan = await createPlanner(new FakeBackend()).planTrip(createTripRequest());

    expect(Object.keys(plan)).toEqual(['flight_suggestions', 'itinerary', 'recommendations', 'weather_forecast']);
    for (const section of Object.values(plan)) {
      expect(section).toContain('Paris');
    }
    expect(plan.itinerary).toContain('lasting for 8 days');
    expect(plan.flight_suggestions).toContain('from New York to Paris');
    expect(plan.recommendations).toContain('**Mid-Range budget**');
  });

  it('uses Any Budget for an out-of-range level', async () => {
    const plan = await createPlanner(new FakeBackend()).planTrip(createTripRequest({ budget_level: 7 }));

    expect(plan.flight_suggestions).toContain('**Any Budget budget**');
  });

  it('isolates a fault to the task that raised it', async () => {
    const backend = new FakeBackend((request) => {
      if (request.prompt.includes(PROMPT_MARKERS.recommendations)) {
        throw new Error('upstream unavailable');
      }
      return echoPrompt(request);
    });

    const plan = await createPlanner(backend).planTrip(createTripRequest());

    expect(plan.recommendations).toBe('An error occurred during recommendation generation: upstream unavailable');
    expect(plan.flight_suggestions).toContain('Paris');
    expect(plan.itinerary).toContain('Paris');
    expect(plan.weather_forecast).toContain('Paris');
    expect(backend.calls).toHaveLength(4);
  });

  it('renders the empty diagnostic with the backend feedback', async () => {
    const backend = new FakeBackend((request): BackendReply =>
      request.prompt.includes(PROMPT_MARKERS.weather)
        ? { kind: 'empty', feedback: { blockReason: 'SAFETY' } }
        : echoPrompt(request)
    );

    const plan = await createPlanner(backend).planTrip(createTripRequest());

    expect(plan.weather_forecast).toBe(
      'Could not get weather forecast and clothing suggestions. The response was empty or blocked. (Feedback: {"blockReason":"SAFETY"})'
    );
    expect(plan.itinerary).toContain('Paris');
  });

  it('still returns four strings when every call fails', async () => {
    const backend = new FakeBackend(() => Promise.reject(new Error('network down')));

    const plan = await createPlanner(backend).planTrip(createTripRequest());

    expect(plan).toEqual({
      flight_suggestions: 'An error occurred during flight suggestion generation: network down',
      itinerary: 'An error occurred during itinerary generation: network down',
      recommendations: 'An error occurred during recommendation generation: network down',
      weather_forecast: 'An error occurred during weather forecasting and clothing suggestions: network down'
    });
  });

  it('returns identical plans for the same request', async () => {
    const planner = createPlanner(new FakeBackend());
    const request = createTripRequest();

    const first = await planner.planTrip(request);
    const second = await planner.planTrip(request);

    expect(second).toEqual(first);
  });

  describe('execution mode', () => {
    function createTrackingBackend() {
      const state = { inFlight: 0, maxInFlight: 0 };
      const backend = new FakeBackend(async (request: BackendRequest) => {
        state.inFlight += 1;
        state.maxInFlight = Math.max(state.maxInFlight, state.inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        state.inFlight -= 1;
        return echoPrompt(request);
      });
      return { backend, state };
    }

    it('runs the four calls concurrently by default', async () => {
      const { backend, state } = createTrackingBackend();

      await createPlanner(backend).planTrip(createTripRequest());

      expect(state.maxInFlight).toBe(4);
    });

    it('runs flights, itinerary, recommendations and weather one after another in sequential mode', async () => {
      const { backend, state } = createTrackingBackend();

      await createPlanner(backend, 'sequential').planTrip(createTripRequest());

      expect(state.maxInFlight).toBe(1);
      expect(backend.calls.map((call) => [call.temperature, call.maxOutputTokens])).toEqual([
        [0.6, 700],
        [0.7, 2048],
        [0.7, 2048],
        [0.4, 1500]
      ]);
      expect(backend.calls[2].prompt).toContain(PROMPT_MARKERS.recommendations);
    });
  });

  it('imposes no timeout of its own on slow generation calls', async () => {
    vi.useFakeTimers();
    const tenMinutes = 10 * 60 * 1000;
    const backend = new FakeBackend(
      () => new Promise<BackendReply>((resolve) => setTimeout(() => resolve({ kind: 'content', text: 'late answer' }), tenMinutes))
    );

    const pending = createPlanner(backend).planTrip(createTripRequest());
    await vi.advanceTimersByTimeAsync(tenMinutes);

    await expect(pending).resolves.toEqual({
      flight_suggestions: 'late answer',
      itinerary: 'late answer',
      recommendations: 'late answer',
      weather_forecast: 'late answer'
    });
  });
});
