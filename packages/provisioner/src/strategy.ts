import { NoStrategyAvailableError, errorMessage } from "./errors";
import type { ProvisionLog } from "./log/provision-log";

export type StrategyContext = { log: ProvisionLog };

/** One way of reaching a target state, e.g. "install with yay" or "start with systemd". */
export interface ProvisioningStrategy<C extends StrategyContext = StrategyContext> {
  name: string;
  isAvailable(ctx: C): Promise<boolean>;
  apply(ctx: C): Promise<void>;
}

export type ApplyOptions = {
  /** Keep trying later available strategies when one fails. */
  fallThrough?: boolean;
  /** Appended to the error when nothing is available. */
  hint?: string;
};

export async function selectStrategy<C extends StrategyContext>(
  strategies: ProvisioningStrategy<C>[],
  ctx: C
): Promise<ProvisioningStrategy<C> | null> {
  for (const strategy of strategies) {
    if (await strategy.isAvailable(ctx)) return strategy;
  }
  return null;
}

/** Applies strategies in priority order and returns the name of the one that succeeded. */
export async function applyFirstAvailable<C extends StrategyContext>(
  strategies: ProvisioningStrategy<C>[],
  ctx: C,
  options: ApplyOptions = {}
): Promise<string> {
  let lastError: unknown;
  let failed = false;
  for (const strategy of strategies) {
    if (!(await strategy.isAvailable(ctx))) {
      ctx.log.info("strategy", `${strategy.name} unavailable`);
      continue;
    }
    try {
      await strategy.apply(ctx);
      ctx.log.info("strategy", `${strategy.name} applied`);
      return strategy.name;
    } catch (err) {
      if (!options.fallThrough) throw err;
      failed = true;
      lastError = err;
      ctx.log.warn("strategy", `${strategy.name} failed, trying next: ${errorMessage(err)}`);
    }
  }
  if (failed) throw lastError;
  throw new NoStrategyAvailableError(
    strategies.map((s) => s.name),
    options.hint
  );
}
