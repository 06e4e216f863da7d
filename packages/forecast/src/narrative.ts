/**
 * Advisory narrative for a forecast.
 *
 * The narrator is an injected capability. The numeric forecast is computed
 * first and returned as is; on any narrator failure the narrative is null.
 */

import type { ServiceBreakdownSummary } from "../../core/src/breakdown.js";
import type { ForecastConfigInput } from "../../core/src/config.js";
import { ExternalProviderError, errorMessage } from "../../core/src/errors.js";
import type { Logger } from "../../core/src/log.js";
import { silentLogger } from "../../core/src/log.js";
import type {
  Anomaly,
  BudgetAlert,
  DailyCostPoint,
  ForecastResult,
} from "../../core/src/schema.js";
import { buildForecastPrompt } from "../../explain/src/prompt.js";
import { forecast } from "./forecaster.js";

export type NarrativeContext = {
  budget?: BudgetAlert | null;
  services?: ServiceBreakdownSummary | null;
  anomalies?: readonly Anomaly[];
  /** Aborted when the caller's time bound expires. */
  signal?: AbortSignal;
};

export interface ForecastNarrator {
  readonly name: string;
  explain(forecast: ForecastResult, context: NarrativeContext): Promise<string | null>;
}

/** Shape of any text-generation backend (hosted LLM API, local model, stub). */
export interface TextGenerationProvider {
  readonly name: string;
  generateText(
    prompt: string,
    opts: { system?: string; max_tokens?: number; signal?: AbortSignal }
  ): Promise<string>;
}

export type NarrativeOutcome = {
  narrative: string | null;
  error: ExternalProviderError | null;
};

export const DEFAULT_NARRATIVE_TIMEOUT_MS = 10_000;

/**
 * Race `run` against a timer. The timer is always cleared; on timeout the
 * timeout error settles first, then the signal handed to `run` is aborted.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string
): Promise<T> {
  const ctrl = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new ExternalProviderError(label, `timed out after ${ms}ms`));
      ctrl.abort();
    }, ms);
  });

  try {
    return await Promise.race([run(ctrl.signal), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export async function narrateForecast(
  narrator: ForecastNarrator,
  result: ForecastResult,
  context: Omit<NarrativeContext, "signal"> = {},
  opts: { timeout_ms?: number; logger?: Logger } = {}
): Promise<NarrativeOutcome> {
  const logger = opts.logger ?? silentLogger;
  const timeout_ms = opts.timeout_ms ?? DEFAULT_NARRATIVE_TIMEOUT_MS;

  try {
    const text = await withTimeout(
      (signal) => narrator.explain(result, { ...context, signal }),
      timeout_ms,
      narrator.name
    );
    const narrative = typeof text === "string" && text.trim().length > 0 ? text.trim() : null;
    return { narrative, error: null };
  } catch (e) {
    const error =
      e instanceof ExternalProviderError
        ? e
        : new ExternalProviderError(narrator.name, errorMessage(e), { cause: e });
    logger.warn(`narrative skipped: ${error.message}`);
    return { narrative: null, error };
  }
}

export type ForecastWithNarrative = {
  forecast: ForecastResult;
  narrative: string | null;
  narrative_error: string | null;
};

export async function forecastWithNarrative(
  series: readonly DailyCostPoint[],
  config: ForecastConfigInput,
  opts: {
    narrator?: ForecastNarrator;
    context?: Omit<NarrativeContext, "signal">;
    timeout_ms?: number;
    logger?: Logger;
  } = {}
): Promise<ForecastWithNarrative> {
  // numeric errors (e.g. InsufficientDataError) still reach the caller
  const result = forecast(series, config);

  if (!opts.narrator) return { forecast: result, narrative: null, narrative_error: null };

  const outcome = await narrateForecast(opts.narrator, result, opts.context, opts);
  return {
    forecast: result,
    narrative: outcome.narrative,
    narrative_error: outcome.error?.message ?? null,
  };
}

/** Adapt a plain text-generation backend to the narrator capability. */
export function createPromptNarrator(
  provider: TextGenerationProvider,
  opts: { max_tokens?: number } = {}
): ForecastNarrator {
  return {
    name: provider.name,
    async explain(result, context) {
      const { system, prompt } = buildForecastPrompt({
        forecast: result,
        budget: context.budget,
        services: context.services,
        anomalies: context.anomalies,
      });
      return provider.generateText(prompt, {
        system,
        max_tokens: opts.max_tokens ?? 1000,
        signal: context.signal,
      });
    },
  };
}
