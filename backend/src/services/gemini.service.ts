/**
 * Gemini backend
 *
 * Adapts the Google Generative AI SDK to TextGenerationBackend. One model
 * handle is created per call since temperature and output length vary by task.
 */

import {
  GoogleGenerativeAI,
  type GenerateContentCandidate,
  type PromptFeedback,
  type SafetyRating
} from '@google/generative-ai';
import type { GenerationSettings } from '../config/app.config';
import type { GenerationFeedback } from '../models/trip.model';
import type { BackendReply, BackendRequest, TextGenerationBackend } from './generation.service';

// A blocked prompt reports on promptFeedback; a blocked answer on the candidate.
const toFeedback = (
  promptFeedback: PromptFeedback | undefined,
  candidate: GenerateContentCandidate | undefined
): GenerationFeedback | null => {
  const feedback: GenerationFeedback = {};

  if (promptFeedback?.blockReason) {
    feedback.blockReason = promptFeedback.blockReason;
  }
  if (promptFeedback?.blockReasonMessage) {
    feedback.blockReasonMessage = promptFeedback.blockReasonMessage;
  }
  if (candidate?.finishReason) {
    feedback.finishReason = candidate.finishReason;
  }

  const ratings: SafetyRating[] | undefined = promptFeedback?.safetyRatings ?? candidate?.safetyRatings;
  if (ratings) {
    feedback.safetyRatings = ratings.map((rating) => ({
      category: rating.category,
      probability: rating.probability
    }));
  }

  return Object.keys(feedback).length > 0 ? feedback : null;
};

export class GeminiBackend implements TextGenerationBackend {
  private readonly client: GoogleGenerativeAI;

  constructor(apiKey: string) {
    this.client = new GoogleGenerativeAI(apiKey);
  }

  async generate(request: BackendRequest): Promise<BackendReply> {
    const model = this.client.getGenerativeModel({
      model: request.model,
      generationConfig: {
        temperature: request.temperature,
        maxOutputTokens: request.maxOutputTokens
      }
    });

    const result = await model.generateContent({
      contents: [{ role: 'user', parts: [{ text: request.prompt }] }]
    });
    const response = result.response;
    const candidate = response.candidates?.[0];
    // response.text() throws for candidates that finished on SAFETY or RECITATION
    const text = (candidate?.content?.parts ?? []).map((part) => part.text ?? '').join('');

    if (text.trim() === '') {
      return { kind: 'empty', feedback: toFeedback(response.promptFeedback, candidate) };
    }

    return { kind: 'content', text };
  }
}

export const createGeminiBackend = (settings: GenerationSettings): GeminiBackend | null => {
  if (!settings.configured || !settings.apiKey) {
    return null;
  }

  const backend = new GeminiBackend(settings.apiKey);
  console.log('Google Generative AI configured successfully.', { model: settings.model });
  return backend;
};
