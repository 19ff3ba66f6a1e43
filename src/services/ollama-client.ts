import { Ollama } from 'ollama';

/**
 * Single request/response text completion
 */
export interface TextCompletionClient {
  complete(model: string, prompt: string): Promise<string>;
}

/**
 * Completion client backed by the Ollama generate endpoint.
 * Always asks for one complete, non-streamed response.
 */
export class OllamaCompletionClient implements TextCompletionClient {
  private readonly ollama: Ollama;

  constructor(host: string, ollama?: Ollama) {
    this.ollama = ollama ?? new Ollama({ host });
  }

  async complete(model: string, prompt: string): Promise<string> {
    const response = await this.ollama.generate({
      model,
      prompt,
      stream: false,
      options: {
        temperature: 0.1, // Low temperature for consistent verdicts
        num_predict: 200,
      },
    });
    return response.response?.trim() ?? '';
  }
}

let sharedClient: OllamaCompletionClient | null = null;
let sharedHost: string | null = null;

/**
 * Gets or creates the completion client for a host (singleton per process)
 */
export function getCompletionClient(host: string): OllamaCompletionClient {
  if (!sharedClient || sharedHost !== host) {
    sharedClient = new OllamaCompletionClient(host);
    sharedHost = host;
  }
  return sharedClient;
}

/**
 * Resets the shared client (useful for testing)
 */
export function resetCompletionClient(): void {
  sharedClient = null;
  sharedHost = null;
}
