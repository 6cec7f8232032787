export type PlanExecution = 'parallel' | 'sequential';

export interface GenerationSettings {
  apiKey: string | null;
  configured: boolean;
  model: string;
}

export interface AppConfig {
  port: number;
  generation: GenerationSettings;
  planExecution: PlanExecution;
}

export const DEFAULT_PORT = 8000;
export const DEFAULT_MODEL = 'gemini-1.5-flash';

const parsePort = (value: string | undefined): number => {
  const port = value ? parseInt(value, 10) : NaN;
  return Number.isInteger(port) && port >= 0 ? port : DEFAULT_PORT;
};

const parsePlanExecution = (value: string | undefined): PlanExecution =>
  value?.trim().toLowerCase() === 'sequential' ? 'sequential' : 'parallel';

/**
 * Builds the process configuration once at startup. The result is frozen and
 * passed to the app factory; nothing reads the environment after this point.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const apiKey = (env.GOOGLE_API_KEY || env.GEMINI_API_KEY || '').trim() || null;

  if (!apiKey) {
    console.error(
      'Error: GOOGLE_API_KEY not found in environment variables. Please create a `.env` file with your key.'
    );
  }

  return Object.freeze({
    port: parsePort(env.PORT),
    generation: Object.freeze({
      apiKey,
      configured: apiKey !== null,
      model: env.GEMINI_MODEL?.trim() || DEFAULT_MODEL
    }),
    planExecution: parsePlanExecution(env.PLAN_EXECUTION)
  });
};
