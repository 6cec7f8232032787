import type { PlanExecution } from '../config/app.config';
import { AppError } from '../middleware/error.middleware';
import type { GenerationOutcome, GenerationTask, TripPlanResponse, TripRequest } from '../models/trip.model';
import { describeBudget } from './budget.service';
import { GenerationClient, renderOutcome } from './generation.service';
import { buildTripPrompts } from './prompt.service';

export const NOT_CONFIGURED_MESSAGE = 'Google Generative AI API is not configured.';

export class TripPlannerService {
  constructor(
    private readonly client: GenerationClient,
    private readonly execution: PlanExecution = 'parallel'
  ) {}

  async planTrip(request: TripRequest): Promise<TripPlanResponse> {
    if (!this.client.configured) {
      throw new AppError(NOT_CONFIGURED_MESSAGE, 503);
    }

    const budget = describeBudget(request.budget_level);
    const prompts = buildTripPrompts(request, budget);

    console.log(`Planning ${budget} trip from ${request.source} to ${request.destination}`, {
      startDate: request.start_date,
      endDate: request.end_date,
      execution: this.execution
    });

    const outcomes = await this.runTasks(prompts);

    return {
      flight_suggestions: renderOutcome('flights', outcomes.flights),
      itinerary: renderOutcome('itinerary', outcomes.itinerary),
      recommendations: renderOutcome('recommendations', outcomes.recommendations),
      weather_forecast: renderOutcome('weather', outcomes.weather)
    };
  }

  private async runTasks(
    prompts: Record<GenerationTask, string>
  ): Promise<Record<GenerationTask, GenerationOutcome>> {
    const run = (task: GenerationTask) => this.client.generate(task, prompts[task]);

    if (this.execution === 'sequential') {
      const flights = await run('flights');
      const itinerary = await run('itinerary');
      const recommendations = await run('recommendations');
      const weather = await run('weather');
      return { flights, itinerary, recommendations, weather };
    }

    const [flights, itinerary, recommendations, weather] = await Promise.all([
      run('flights'),
      run('itinerary'),
      run('recommendations'),
      run('weather')
    ]);
    return { flights, itinerary, recommendations, weather };
  }
}
