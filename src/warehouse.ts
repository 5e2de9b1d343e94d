// warehouse.ts
// Contract for the warehouse collaborator. The resolver never executes SQL;
// callers hand a successful outcome to their client through here so failures
// come back tagged with the stage that produced the text.

import { EngineError, InvalidRequestError, WarehouseExecutionError } from "./errors";
import type { ResolutionOutcome } from "./resolver";

export interface QueryResult {
  columns: string[];
  rows: unknown[][];
}

export interface ExecuteOptions {
  signal: AbortSignal;
}

export interface WarehouseClient {
  execute(sql: string, options: ExecuteOptions): Promise<QueryResult>;
}

export interface ExecuteResolutionOptions {
  /** Abort the statement after this many milliseconds. */
  timeoutMs?: number;
}

/**
 * Run a resolved query. Warehouse errors are wrapped, unchanged, in a
 * WarehouseExecutionError carrying the stage and the SQL text. Nothing is
 * retried.
 */
export async function executeResolution(
  client: WarehouseClient,
  outcome: ResolutionOutcome,
  options: ExecuteResolutionOptions = {}
): Promise<QueryResult> {
  if (!outcome.ok) {
    throw new InvalidRequestError(`Cannot execute a failed resolution (${outcome.state})`, {
      cause: outcome.error,
    });
  }

  const controller = new AbortController();
  const timer =
    options.timeoutMs !== undefined
      ? setTimeout(
          () => controller.abort(new Error(`Query timed out after ${options.timeoutMs}ms`)),
          options.timeoutMs
        )
      : undefined;

  try {
    return await client.execute(outcome.query_text, { signal: controller.signal });
  } catch (err) {
    if (err instanceof EngineError) throw err;
    throw new WarehouseExecutionError(outcome.source, outcome.query_text, err);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}
