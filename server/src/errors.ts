export type ResolverErrorCode = "invalid_input" | "simulation_failed";

export class InvalidInputError extends Error {
  readonly code: ResolverErrorCode = "invalid_input";
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = "InvalidInputError";
    this.field = field;
  }
}

export class SimulationExecutionError extends Error {
  readonly code: ResolverErrorCode = "simulation_failed";
  readonly backend: "sampling" | "fallback";

  constructor(message: string, backend: "sampling" | "fallback", cause?: unknown) {
    super(message, { cause });
    this.name = "SimulationExecutionError";
    this.backend = backend;
  }
}

export class KnowledgeBaseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "KnowledgeBaseError";
  }
}

export type ResolverError = InvalidInputError | SimulationExecutionError;

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
