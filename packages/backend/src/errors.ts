import type { ZodIssue } from "zod";
import type { ErrorKind } from "@finhop/shared";

export interface IssueDetail {
  path: string;
  message: string;
}

export function describeIssues(issues: ZodIssue[]): IssueDetail[] {
  return issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
}

export abstract class EngineError extends Error {
  abstract readonly kind: ErrorKind;
}

/** Recoverable: nothing matched. The engine still answers, ungrounded. */
export class EmptyEvidenceError extends EngineError {
  readonly kind = "empty_evidence";

  constructor(query: string) {
    super(`No chunks or graph anchors matched the query: ${query}`);
    this.name = "EmptyEvidenceError";
  }
}

export type GenerationFailureReason = "timeout" | "aborted" | "provider" | "invalid_response";

export class GenerationError extends EngineError {
  readonly kind = "generation";

  constructor(
    readonly reason: GenerationFailureReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "GenerationError";
  }
}

export class CorpusUnavailableError extends EngineError {
  readonly kind = "corpus_unavailable";

  constructor(message = "Corpus snapshot is not loaded", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CorpusUnavailableError";
  }
}

export class ConfigurationError extends EngineError {
  readonly kind = "configuration";

  constructor(
    message: string,
    readonly issues: IssueDetail[] = []
  ) {
    super(message);
    this.name = "ConfigurationError";
  }

  static fromZodIssues(message: string, issues: ZodIssue[]): ConfigurationError {
    return new ConfigurationError(message, describeIssues(issues));
  }
}
