import type { GenerateOptions, PromptMessage, TextGenerator } from "../../src/services/llmTypes.js";

type Responder = (messages: PromptMessage[], options: GenerateOptions) => string | Promise<string>;

export class FakeTextGenerator implements TextGenerator {
  readonly calls: Array<{ messages: PromptMessage[]; options: GenerateOptions }> = [];

  private readonly respond: Responder;

  constructor(response: string | Responder = "") {
    this.respond = typeof response === "string" ? () => response : response;
  }

  async generate(messages: PromptMessage[], options: GenerateOptions = {}): Promise<string> {
    this.calls.push({ messages, options });
    return this.respond(messages, options);
  }

  lastUserPrompt(): string {
    const last = this.calls[this.calls.length - 1];
    const message = last?.messages[last.messages.length - 1];
    return message?.content ?? "";
  }
}

export function jsonAnswer(answer: string, steps: Array<{ statement: string; evidence: string[] }> = []): string {
  return JSON.stringify({ answer, steps });
}
