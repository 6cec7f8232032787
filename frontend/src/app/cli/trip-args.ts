import { parseArgs } from 'util';
import { BUDGET_OPTIONS, type BudgetLevel, type TripForm, TripPlanError, toIsoDate } from '../services/trip-plan.service';

export const USAGE = `Usage: plan-trip --from <city> --to <city> [--start YYYY-MM-DD] [--end YYYY-MM-DD] [--budget 1|2|3]

  --from     Departure city, e.g. "New York"
  --to       Destination, e.g. "Paris"
  --start    Start date (default: today)
  --end      End date (default: start date + 7 days)
  --budget   1 Budget-Friendly, 2 Mid-Range, 3 Luxury, or the label (default: 1)`;

export type TripArgs = { help: true } | { help: false; form: TripForm };

export function parseBudgetLevel(value: string | undefined): BudgetLevel {
  if (value === undefined) {
    return 1;
  }

  const normalized = value.trim().toLowerCase();
  const option = BUDGET_OPTIONS.find(
    ({ level, label }) => String(level) === normalized || label.toLowerCase() === normalized
  );
  if (!option) {
    throw new TripPlanError(`Unknown budget level "${value}". Use 1, 2 or 3 (Budget-Friendly, Mid-Range, Luxury).`);
  }
  return option.level;
}

export function parseTripArgs(argv: string[], today: string = toIsoDate(new Date())): TripArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      from: { type: 'string' },
      to: { type: 'string' },
      start: { type: 'string' },
      end: { type: 'string' },
      budget: { type: 'string' },
      help: { type: 'boolean', short: 'h' }
    }
  });

  if (values.help) {
    return { help: true };
  }

  return {
    help: false,
    form: {
      source: values.from ?? '',
      destination: values.to ?? '',
      startDate: values.start ?? today,
      endDate: values.end,
      budgetLevel: parseBudgetLevel(values.budget)
    }
  };
}
