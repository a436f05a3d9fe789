import Anthropic from "@anthropic-ai/sdk";

export interface CompletionRequest {
  model: string;
  system: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
}

/** The single request/response exchange the rule extractor needs from a model. */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

export function createAnthropicCompletionClient(apiKey: string): CompletionClient {
  const client = new Anthropic({ apiKey });

  return {
    async complete({ model, system, prompt, maxTokens, temperature }) {
      const response = await client.messages.create({
        model,
        max_tokens: maxTokens,
        temperature,
        system,
        messages: [{ role: "user", content: prompt }],
      });

      return response.content
        .flatMap((block) => (block.type === "text" ? [block.text] : []))
        .join("");
    },
  };
}
