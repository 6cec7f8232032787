import type { NextFunction, Request, Response } from 'express';
import { matchedData, validationResult } from 'express-validator';
import type { TripRequest } from '../models/trip.model';
import type { TripPlannerService } from '../services/trip-planner.service';

export const HEALTH_MESSAGE = 'AI Travel Planner API is running';

export class TripController {
  constructor(private readonly planner: TripPlannerService) {}

  health(req: Request, res: Response): void {
    res.json({ status: 'healthy', message: HEALTH_MESSAGE });
  }

  async planTrip(req: Request, res: Response, next: NextFunction): Promise<void> {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      res.status(400).json({ errors: errors.array() });
      return;
    }

    const tripRequest = Object.freeze(matchedData<TripRequest>(req, { locations: ['body'] }));

    try {
      const plan = await this.planner.planTrip(tripRequest);
      res.json(plan);
    } catch (error) {
      next(error);
    }
  }
}
