import type { OdmConfigurations } from "./types";

let configurations: Partial<OdmConfigurations> = {};

export function setOdmConfigurations(odmConfigurations: OdmConfigurations) {
  configurations = {
    ...configurations,
    ...odmConfigurations,
  };
}

export function getOdmConfigurations(): OdmConfigurations {
  return { ...configurations };
}

export function getOdmConfig<Key extends keyof OdmConfigurations>(
  key: Key,
): OdmConfigurations[Key] {
  return configurations[key];
}

export function getOdmDebugLevel(): NonNullable<OdmConfigurations["debugLevel"]> {
  return configurations.debugLevel || "warn";
}

/**
 * Whether messages of the given level pass the configured debug level.
 * `error` always passes, `info` only passes when the debug level is `info`.
 */
export function shouldLog(level: NonNullable<OdmConfigurations["debugLevel"]>): boolean {
  const order = { error: 0, warn: 1, info: 2 } as const;

  return order[level] <= order[getOdmDebugLevel()];
}

export function resetOdmConfigurations() {
  configurations = {};
}
