#!/usr/bin/env node
import dotenv from 'dotenv';
import { USAGE, parseTripArgs } from './app/cli/trip-args';
import { renderTripPlan } from './app/services/result-renderer.service';
import { TripPlanService, validateTripForm } from './app/services/trip-plan.service';

async function main(): Promise<void> {
  dotenv.config();

  const args = parseTripArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const errors = validateTripForm(args.form);
  if (errors.length > 0) {
    errors.forEach((error) => console.error(error));
    console.error(`\n${USAGE}`);
    process.exitCode = 1;
    return;
  }

  const service = new TripPlanService();
  console.log(`🌍 Planning your dream trip via ${service.apiEndpoint}... Please wait!`);

  const plan = await service.planTrip(args.form);
  console.log('Your travel plan is ready! 🎉\n');
  console.log(renderTripPlan(plan));
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
