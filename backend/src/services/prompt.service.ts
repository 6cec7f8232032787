import type { BudgetDescriptor, GenerationTask, TripRequest } from '../models/trip.model';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Inclusive number of days between two YYYY-MM-DD dates, so a trip that starts
 * and ends on the same day lasts one day.
 */
export const tripDurationDays = (startDate: string, endDate: string): number =>
  Math.round((Date.parse(endDate) - Date.parse(startDate)) / MS_PER_DAY) + 1;

export const buildFlightPrompt = (
  source: string,
  destination: string,
  startDate: string,
  endDate: string,
  budget: BudgetDescriptor
): string => `As a travel planning AI, suggest potential flight options for a trip from ${source} to ${destination}.
The desired departure date is ${startDate} and the return date is ${endDate}.
Please provide suggestions that align with a **${budget} budget**.

Suggest a few possible airlines, potential layover cities (if applicable), and a general idea of what one might expect regarding flight duration or typical costs for this route and budget.
Emphasize that these are *suggestions based on general knowledge* and that users should perform a real-time flight search for accurate prices and availability.

Present the response clearly using Markdown.`;

export const buildItineraryPrompt = (
  destination: string,
  startDate: string,
  endDate: string,
  budget: BudgetDescriptor
): string => {
  const duration = tripDurationDays(startDate, endDate);

  return `Create a detailed travel itinerary for a trip to ${destination}.
The trip starts on ${startDate} and ends on ${endDate}, lasting for ${duration} days.
Please plan the trip with a **${budget} budget** in mind.

Provide a day-by-day plan including:
- Suggested activities for morning, afternoon, and evening (suitable for a ${budget} budget).
- Recommendations for places to visit (landmarks, museums, parks, etc.) - mention cost implications if relevant to the budget.
- Optional: Suggestions for local food or restaurants to try that fit a ${budget} budget.
- Optional: Basic tips for getting around (e.g., public transport, walking) that are budget-conscious.

Format the output clearly, perhaps using Markdown with headings for each day.
Be creative and provide practical suggestions for a memorable trip.`;
};

export const buildRecommendationsPrompt = (
  location: string,
  budget: BudgetDescriptor
): string => `You are an expert Restaurant & Hotel Planner.
Your job is to provide Restaurant & Hotel recommendations for ${location}.
Please provide recommendations specifically for a **${budget} budget**.

- For Restaurants: Provide Top 5 restaurants that fit a ${budget} budget, with address and a general idea of average cost or cuisine type. Include a rating if available or inferable.
- For Hotels: Provide Top 5 hotels that fit a ${budget} budget, with address and a general idea of average cost per night or star rating. Include a rating if available or inferable.

Return the response using Markdown for clear formatting.`;

export const buildWeatherPrompt = (
  location: string
): string => `You are an expert weather forecaster and travel advisor. Your job is to provide a detailed weather forecast and suggest appropriate clothing to pack for a trip to ${location}.
Provide the forecast for the next 7 days, starting from today's date.
Include details such as:
- Daily temperature range (High/Low)
- Precipitation (chance of rain/snow)
- Humidity
- Wind conditions
- Air Quality (if available or inferable)
- Cloud Cover

Based on this 7-day forecast, provide a clear and concise suggestion for the type of clothing and gear someone should pack for their trip to ${location} during this period. Consider layering if temperatures vary.

Present the response clearly using Markdown, with a section for the daily forecast and a separate section for clothing suggestions.`;

export const buildTripPrompts = (
  request: TripRequest,
  budget: BudgetDescriptor
): Record<GenerationTask, string> => ({
  flights: buildFlightPrompt(
    request.source,
    request.destination,
    request.start_date,
    request.end_date,
    budget
  ),
  itinerary: buildItineraryPrompt(request.destination, request.start_date, request.end_date, budget),
  recommendations: buildRecommendationsPrompt(request.destination, budget),
  weather: buildWeatherPrompt(request.destination)
});
