export type RedefinitionPolicy = "last-wins" | "reject";

export interface Config {
  // registers per frame; also caps allocation in each compile-time scope
  frameSize: number;
  // nested calls allowed before the VM faults
  maxCallDepth: number;
  // executed instructions allowed before the VM faults; null is unlimited
  maxSteps: number | null;
  // validate call targets and argument counts at build time
  checkCalls: boolean;
  redefinition: RedefinitionPolicy;
}

export const DEFAULT_CONFIG: Readonly<Config> = {
  frameSize: 256,
  maxCallDepth: 10_000,
  maxSteps: null,
  checkCalls: true,
  redefinition: "last-wins",
};

export class ConfigError extends Error {
  constructor(public readonly key: keyof Config, value: unknown) {
    super(`invalid ${key}: ${String(value)}`);
  }
}

function positiveInteger(key: keyof Config, value: number): number {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ConfigError(key, value);
  }
  return value;
}

export function resolveConfig(overrides: Partial<Config> = {}): Config {
  const config = { ...DEFAULT_CONFIG, ...overrides };
  positiveInteger("frameSize", config.frameSize);
  positiveInteger("maxCallDepth", config.maxCallDepth);
  if (config.maxSteps !== null) positiveInteger("maxSteps", config.maxSteps);
  if (config.redefinition !== "last-wins" && config.redefinition !== "reject") {
    throw new ConfigError("redefinition", config.redefinition);
  }
  return config;
}
