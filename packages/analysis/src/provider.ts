import { ExternalProviderError, errorMessage } from "../../core/src/errors.js";
import { assertSeries } from "../../core/src/invariants.js";
import type {
  DailyCostPoint,
  DateRange,
  ISODate,
  ServiceBreakdown,
} from "../../core/src/schema.js";
import { parseDailyCostSeries, parseServiceBreakdown } from "../../core/src/validate.js";

/** Source of raw spend (a billing API, an export, the demo generator). */
export interface CostDataProvider {
  readonly name: string;
  fetchDailyCosts(range: DateRange, account_name?: string): Promise<DailyCostPoint[]>;
  fetchServiceBreakdown(range: DateRange, account_name?: string): Promise<ServiceBreakdown>;
}

async function guarded<T>(provider: CostDataProvider, what: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (e) {
    if (e instanceof ExternalProviderError) throw e;
    throw new ExternalProviderError(provider.name, `${what}: ${errorMessage(e)}`, { cause: e });
  }
}

/**
 * Fetch and validate a daily series. Anything wrong with the payload
 * (transport, shape, ordering, future dates) surfaces as ExternalProviderError.
 */
export async function loadDailyCosts(
  provider: CostDataProvider,
  range: DateRange,
  opts: { account_name?: string; as_of?: ISODate } = {}
): Promise<DailyCostPoint[]> {
  return guarded(provider, "daily costs", async () => {
    const series = parseDailyCostSeries(await provider.fetchDailyCosts(range, opts.account_name));
    assertSeries(series, opts.as_of);
    return series;
  });
}

export async function loadServiceBreakdown(
  provider: CostDataProvider,
  range: DateRange,
  opts: { account_name?: string } = {}
): Promise<ServiceBreakdown> {
  return guarded(provider, "service breakdown", async () =>
    parseServiceBreakdown(await provider.fetchServiceBreakdown(range, opts.account_name))
  );
}
