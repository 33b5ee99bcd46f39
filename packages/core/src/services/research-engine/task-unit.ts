/**
 * Task unit
 *
 * One bounded tool invocation. Consumes a budget unit whatever the outcome,
 * never retries, and turns every failure into a typed ToolError.
 */

import { ToolError, toToolError } from "../../errors";
import type { Finding } from "../../models/finding";
import type {
  Instruction,
  ToolProvider,
  ToolResult,
} from "../../interfaces/tool-provider";
import type { IterationBudget } from "./budget";

export type TaskOutcome =
  | { ok: true; finding: Finding }
  | { ok: false; error: ToolError };

export interface TaskUnitOptions {
  timeoutMs: number;
  signal?: AbortSignal; // Cancellation from the owning worker
  now?: () => number;
}

/**
 * Call the provider and validate what it hands back
 */
async function invokeSafely(
  provider: ToolProvider,
  instruction: Instruction,
  signal: AbortSignal
): Promise<ToolResult> {
  try {
    const result = await provider.invoke(instruction, { signal });
    if (result.ok) {
      const text = result.content?.text;
      if (typeof text !== "string" || text.trim().length === 0) {
        return {
          ok: false,
          error: new ToolError(
            "MalformedResponse",
            `${provider.getName()} returned no text content`
          ),
        };
      }
    }
    return result;
  } catch (error) {
    return { ok: false, error: toToolError(error) };
  }
}

/**
 * Execute one task unit against the provider
 */
export async function executeTaskUnit(
  provider: ToolProvider,
  instruction: Instruction,
  budget: IterationBudget,
  options: TaskUnitOptions
): Promise<TaskOutcome> {
  const now = options.now ?? Date.now;
  budget.consume();
  const iteration = budget.used;

  if (options.signal?.aborted) {
    return {
      ok: false,
      error: new ToolError("ToolTimeout", "Cancelled before invocation"),
    };
  }

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onCancel: (() => void) | undefined;

  const timedOut = new Promise<ToolResult>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({
        ok: false,
        error: new ToolError(
          "ToolTimeout",
          `Tool call exceeded ${options.timeoutMs}ms`
        ),
      });
    }, options.timeoutMs);
  });

  const cancelled = new Promise<ToolResult>((resolve) => {
    onCancel = () => {
      controller.abort();
      resolve({
        ok: false,
        error: new ToolError("ToolTimeout", "Tool call cancelled"),
      });
    };
    options.signal?.addEventListener("abort", onCancel, { once: true });
  });

  try {
    const result = await Promise.race([
      invokeSafely(provider, instruction, controller.signal),
      timedOut,
      cancelled,
    ]);

    if (!result.ok) {
      return { ok: false, error: result.error };
    }

    const finding: Finding = Object.freeze({
      content: result.content.text.trim(),
      source: result.content.source
        ? Object.freeze({ ...result.content.source })
        : undefined,
      timestamp: now(),
      iteration,
    });
    return { ok: true, finding };
  } finally {
    clearTimeout(timer);
    if (onCancel) {
      options.signal?.removeEventListener("abort", onCancel);
    }
  }
}
