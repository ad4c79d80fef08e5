import { GoogleGenerativeAI } from "@google/generative-ai";
import { loadConfig } from "../configs/environment";
import { logger } from "../utils/logger";

export interface PlanModel {
  readonly name: string;
  generate(prompt: string): Promise<string>;
}

/** Hosted plan generation through Gemini. */
export class GeminiPlanModel implements PlanModel {
  private gemini: GoogleGenerativeAI;

  constructor(
    apiKey: string,
    readonly name: string,
    private readonly temperature: number,
    private readonly maxOutputTokens: number
  ) {
    this.gemini = new GoogleGenerativeAI(apiKey);
  }

  async generate(prompt: string): Promise<string> {
    const model = this.gemini.getGenerativeModel({
      model: this.name,
      generationConfig: {
        temperature: this.temperature,
        maxOutputTokens: this.maxOutputTokens,
      },
    });

    const result = await model.generateContent(prompt);
    return result.response.text();
  }
}

/**
 * The configured hosted model, or `null` when no API key is set and the
 * service only builds prompts.
 */
export function createPlanModel(): PlanModel | null {
  const { gemini } = loadConfig();
  if (!gemini.apiKey) {
    logger.warn(
      "GEMINI_API_KEY not configured. Plan generation will return the prompt only."
    );
    return null;
  }
  logger.info(`Gemini plan model ${gemini.model} initialized ✅`);
  return new GeminiPlanModel(
    gemini.apiKey,
    gemini.model,
    gemini.temperature,
    gemini.maxTokens
  );
}
