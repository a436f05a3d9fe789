import type { CompletionClient, CompletionRequest } from "../../src/llm/client.js";

/** Replays scripted answers; an Error entry is thrown instead of returned. */
export class ScriptedCompletionClient implements CompletionClient {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly answers: Array<string | Error>) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const next = this.answers.shift();
    if (next === undefined) throw new Error("No scripted answer left");
    if (next instanceof Error) throw next;
    return next;
  }
}
