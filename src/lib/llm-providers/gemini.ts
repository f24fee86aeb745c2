import { GoogleGenerativeAI } from "@google/generative-ai";
import { ModelCallError, type CompletionClient, type CompletionRequest } from "./types";

export const DEFAULT_MODEL_ID = "gemini-2.5-flash";

export function getGeminiApiKey(env: NodeJS.ProcessEnv = process.env): string {
  const key = env.GOOGLE_AI_API_KEY ?? env.GEMINI_API_KEY;
  if (!key) {
    throw new Error(
      "GOOGLE_AI_API_KEY or GEMINI_API_KEY required when LLM_PROVIDER=gemini"
    );
  }
  return key;
}

export class GeminiCompletionClient implements CompletionClient {
  readonly name = "Gemini";
  private readonly genAI: GoogleGenerativeAI;
  private readonly modelId: string;

  constructor(apiKey: string, modelId: string = DEFAULT_MODEL_ID) {
    this.genAI = new GoogleGenerativeAI(apiKey);
    this.modelId = modelId;
  }

  async complete({ system, user, temperature, maxTokens }: CompletionRequest): Promise<string> {
    const model = this.genAI.getGenerativeModel({
      model: this.modelId,
      systemInstruction: system,
      generationConfig: { temperature, maxOutputTokens: maxTokens },
    });

    let text: string;
    try {
      const result = await model.generateContent(user);
      text = result.response.text();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ModelCallError(`Gemini API error (${message})`, { cause: error });
    }

    if (!text) {
      throw new ModelCallError("Empty response from Gemini");
    }
    return text;
  }
}
