import { Router, type Request, type Response, type NextFunction } from 'express';
import type { TripController } from '../controllers/trip.controller';
import { tripRequestValidation } from '../middleware/validation.middleware';

export const createTripRoutes = (tripController: TripController): Router => {
  const router = Router();

  // Health check
  router.get('/', (req: Request, res: Response) =>
    tripController.health(req, res)
  );

  router.post('/plan_trip/', tripRequestValidation, (req: Request, res: Response, next: NextFunction) =>
    tripController.planTrip(req, res, next)
  );

  return router;
};
