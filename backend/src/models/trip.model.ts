export type BudgetDescriptor = 'Budget-Friendly' | 'Mid-Range' | 'Luxury' | 'Any Budget';

export type GenerationTask = 'flights' | 'itinerary' | 'recommendations' | 'weather';

export interface TripRequest {
  source: string;
  destination: string;
  start_date: string; // YYYY-MM-DD
  end_date: string; // YYYY-MM-DD
  budget_level: number; // 1 Budget-Friendly, 2 Mid-Range, 3 Luxury
}

export interface TripPlanResponse {
  flight_suggestions: string;
  itinerary: string;
  recommendations: string;
  weather_forecast: string;
}

export interface SafetyRating {
  category: string;
  probability: string;
}

export interface GenerationFeedback {
  blockReason?: string;
  blockReasonMessage?: string;
  finishReason?: string;
  safetyRatings?: SafetyRating[];
}

export type GenerationOutcome =
  | { kind: 'ok'; text: string }
  | { kind: 'empty'; feedback: GenerationFeedback | null }
  | { kind: 'fault'; message: string }
  | { kind: 'unconfigured' };
