import type { QueryEmbedder } from "../../src/services/llmTypes.js";

export class FakeEmbedder implements QueryEmbedder {
  calls = 0;

  constructor(
    private readonly embedding: number[] | Error,
    readonly dimensions = 4
  ) {}

  async embed(_text: string): Promise<number[]> {
    this.calls += 1;
    if (this.embedding instanceof Error) {
      throw this.embedding;
    }
    return [...this.embedding];
  }
}
