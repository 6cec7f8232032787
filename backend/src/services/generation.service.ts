import type { GenerationSettings } from '../config/app.config';
import type {
  GenerationFeedback,
  GenerationOutcome,
  GenerationTask
} from '../models/trip.model';

export interface BackendRequest {
  model: string;
  prompt: string;
  temperature: number;
  maxOutputTokens: number;
}

export type BackendReply =
  | { kind: 'content'; text: string }
  | { kind: 'empty'; feedback: GenerationFeedback | null };

/**
 * A single-shot text generation service. Implementations may throw; the
 * GenerationClient turns every failure into an outcome.
 */
export interface TextGenerationBackend {
  generate(request: BackendRequest): Promise<BackendReply>;
}

export interface GenerationRequest extends BackendRequest {
  task: GenerationTask;
}

interface TaskProfile {
  temperature: number;
  maxOutputTokens: number;
  // "Cannot <action>." / "Could not <action>."
  action: string;
  // "An error occurred during <activity>: ..."
  activity: string;
}

export const TASK_PROFILES: Readonly<Record<GenerationTask, TaskProfile>> = {
  flights: {
    temperature: 0.6,
    maxOutputTokens: 700,
    action: 'generate flight suggestions',
    activity: 'flight suggestion generation'
  },
  itinerary: {
    temperature: 0.7,
    maxOutputTokens: 2048,
    action: 'generate itinerary',
    activity: 'itinerary generation'
  },
  recommendations: {
    temperature: 0.7,
    maxOutputTokens: 2048,
    action: 'generate recommendations',
    activity: 'recommendation generation'
  },
  weather: {
    temperature: 0.4,
    maxOutputTokens: 1500,
    action: 'get weather forecast and clothing suggestions',
    activity: 'weather forecasting and clothing suggestions'
  }
};

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class GenerationClient {
  constructor(
    private readonly settings: GenerationSettings,
    private readonly backend: TextGenerationBackend | null
  ) {}

  get configured(): boolean {
    return this.settings.configured && this.backend !== null;
  }

  async generate(task: GenerationTask, prompt: string): Promise<GenerationOutcome> {
    const { temperature, maxOutputTokens } = TASK_PROFILES[task];
    return this.complete({ task, prompt, temperature, maxOutputTokens, model: this.settings.model });
  }

  async complete(request: GenerationRequest): Promise<GenerationOutcome> {
    const { task, model, temperature, maxOutputTokens } = request;

    if (!this.settings.configured || !this.backend) {
      return { kind: 'unconfigured' };
    }

    console.log(`Generating ${task} using ${model}...`, { task, model, temperature, maxOutputTokens });

    try {
      const reply = await this.backend.generate({
        model,
        prompt: request.prompt,
        temperature,
        maxOutputTokens
      });

      if (reply.kind === 'content') {
        console.log(`Generated ${task} successfully.`, { task, length: reply.text.length });
        return { kind: 'ok', text: reply.text };
      }

      console.warn(`Received an empty response or content was blocked for ${task}.`, {
        task,
        feedback: reply.feedback
      });
      return { kind: 'empty', feedback: reply.feedback };
    } catch (error) {
      console.error(`An error occurred during ${TASK_PROFILES[task].activity}:`, error);
      return { kind: 'fault', message: errorMessage(error) };
    }
  }
}

const formatFeedback = (feedback: GenerationFeedback | null): string =>
  feedback ? JSON.stringify(feedback) : 'none';

/**
 * Collapses an outcome into the single display string the HTTP response
 * carries for each section.
 */
export const renderOutcome = (task: GenerationTask, outcome: GenerationOutcome): string => {
  const { action, activity } = TASK_PROFILES[task];

  switch (outcome.kind) {
    case 'ok':
      return outcome.text;
    case 'empty':
      return `Could not ${action}. The response was empty or blocked. (Feedback: ${formatFeedback(outcome.feedback)})`;
    case 'fault':
      return `An error occurred during ${activity}: ${outcome.message}`;
    case 'unconfigured':
      return `API not configured. Cannot ${action}.`;
  }
};
