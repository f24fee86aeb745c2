/**
 * Contract between the recipe generator and a text-completion backend.
 */

export interface CompletionRequest {
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
}

export interface CompletionClient {
  /** Human-readable backend name, used in error messages. */
  readonly name: string;
  complete(request: CompletionRequest): Promise<string>;
}

export class ModelCallError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ModelCallError";
  }
}
