import express, { type Application } from 'express';
import cors from 'cors';
import type { AppConfig } from './config/app.config';
import { TripController } from './controllers/trip.controller';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { createTripRoutes } from './routes/trip.routes';
import { createGeminiBackend } from './services/gemini.service';
import { GenerationClient, type TextGenerationBackend } from './services/generation.service';
import { TripPlannerService } from './services/trip-planner.service';

export interface AppDependencies {
  config: AppConfig;
  // Defaults to the Gemini backend built from config.generation
  backend?: TextGenerationBackend | null;
}

export const createApp = ({ config, backend }: AppDependencies): Application => {
  const generationBackend = backend === undefined ? createGeminiBackend(config.generation) : backend;
  const generationClient = new GenerationClient(config.generation, generationBackend);
  const tripPlanner = new TripPlannerService(generationClient, config.planExecution);

  const app: Application = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Routes
  app.use('/', createTripRoutes(new TripController(tripPlanner)));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
