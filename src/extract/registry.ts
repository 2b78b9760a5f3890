import type { ExtractionStrategy } from "./strategy";
import { GenericStrategy } from "./strategies/generic";
import type { Outcome } from "../types/failure";
import { fail } from "../types/failure";
import { ok } from "../types/result";

export type StrategyRegistry = ReadonlyMap<string, ExtractionStrategy>;

export function createStrategyRegistry(strategies: ExtractionStrategy[]): StrategyRegistry {
  const registry = new Map<string, ExtractionStrategy>();
  for (const strategy of strategies) {
    if (registry.has(strategy.spec)) {
      throw new Error(`Extraction spec ${strategy.spec} is registered twice`);
    }
    registry.set(strategy.spec, strategy);
  }
  return registry;
}

export function defaultStrategyRegistry(): StrategyRegistry {
  return createStrategyRegistry([new GenericStrategy()]);
}

export function resolveStrategy(
  registry: StrategyRegistry,
  spec: string | null | undefined
): Outcome<ExtractionStrategy> {
  if (!spec) {
    return fail("UnknownSpec", "No extraction spec given");
  }
  const strategy = registry.get(spec);
  if (!strategy) {
    const known = Array.from(registry.keys()).sort().join(", ");
    return fail("UnknownSpec", `Cannot resolve extraction spec ${spec} (known: ${known || "none"})`);
  }
  return ok(strategy);
}
