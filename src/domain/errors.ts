export type PipelineStage = "config" | "load" | "clean" | "merge" | "reshape" | "aggregate" | "export";

export class PipelineError extends Error {
  constructor(
    public readonly stage: PipelineStage,
    message: string
  ) {
    super(message);
    this.name = "PipelineError";
  }
}

/** File missing, unreadable, malformed, or lacking a required column. */
export class LoadError extends PipelineError {
  constructor(
    public readonly path: string,
    reason: string
  ) {
    super("load", `Cannot load ${path}: ${reason}`);
    this.name = "LoadError";
  }
}

/** Rename collision or a value that does not fit its column. */
export class SchemaError extends PipelineError {
  constructor(
    public readonly column: string,
    reason: string,
    stage: PipelineStage = "clean"
  ) {
    super(stage, `Column "${column}": ${reason}`);
    this.name = "SchemaError";
  }
}

export class JoinError extends PipelineError {
  constructor(
    public readonly key: string,
    reason: string
  ) {
    super("merge", `Join on "${key}" failed: ${reason}`);
    this.name = "JoinError";
  }
}

export class ReshapeError extends PipelineError {
  constructor(reason: string) {
    super("reshape", reason);
    this.name = "ReshapeError";
  }
}

export class AggregationError extends PipelineError {
  constructor(reason: string) {
    super("aggregate", reason);
    this.name = "AggregationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
