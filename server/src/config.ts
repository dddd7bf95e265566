import { InvalidInputError } from "./errors";

/* ============================================================================
   Resolver configuration
   ============================================================================ */

export type SimulatorKind = "statevector" | "none";

export type ResolverConfig = {
  readonly simulator: SimulatorKind;

  /** Independent samples collected per circuit run. */
  readonly shots: number;
  /** Alternating cost/mixer layer pairs. */
  readonly layers: number;
  readonly seed: number;

  /** Signal mix for the classical baseline. */
  readonly classicalWeights: {
    readonly surname: number;
    readonly cultural: number;
    readonly geographic: number;
  };

  /** Final blend of baseline and simulator region distributions. */
  readonly synthesisWeights: {
    readonly classical: number;
    readonly simulator: number;
  };

  readonly fallback: {
    readonly sharpenThreshold: number;
    readonly sharpenExponent: number;
    readonly suppressExponent: number;
    readonly primaryEthnicWeight: number;
    readonly secondaryEthnicWeight: number;
    readonly secondaryEthnicCount: number;
    readonly coherence: number;
  };

  readonly circuit: {
    readonly encodedRegions: number;
    readonly boostThreshold: number;
    readonly ethnicPhaseScale: number;
  };

  readonly descendants: {
    readonly shortSurnameLength: number;
    readonly shortSurnameMultiplier: number;
  };
};

/**
 * Empirical constants. Values are kept as-is; they carry no further
 * derivation.
 */
export const DEFAULT_RESOLVER_CONFIG: ResolverConfig = deepFreeze({
  simulator: "statevector",
  shots: 8192,
  layers: 6,
  seed: 1337,
  classicalWeights: { surname: 0.4, cultural: 0.35, geographic: 0.25 },
  synthesisWeights: { classical: 0.3, simulator: 0.7 },
  fallback: {
    sharpenThreshold: 0.2,
    sharpenExponent: 0.7,
    suppressExponent: 1.3,
    primaryEthnicWeight: 0.7,
    secondaryEthnicWeight: 0.1,
    secondaryEthnicCount: 3,
    coherence: 0.75,
  },
  circuit: {
    encodedRegions: 5,
    boostThreshold: 0.15,
    ethnicPhaseScale: 0.8,
  },
  descendants: {
    shortSurnameLength: 6,
    shortSurnameMultiplier: 1.5,
  },
});

export type ResolverConfigOverrides = Partial<
  Pick<ResolverConfig, "simulator" | "shots" | "layers" | "seed">
>;

/* ============================================================================
   Builders
   ============================================================================ */

export function createResolverConfig(
  overrides: ResolverConfigOverrides = {}
): ResolverConfig {
  const config = { ...DEFAULT_RESOLVER_CONFIG, ...overrides };

  if (!Number.isInteger(config.shots) || config.shots < 1) {
    throw new InvalidInputError("shots must be a positive integer.", "shots");
  }
  if (!Number.isInteger(config.layers) || config.layers < 1) {
    throw new InvalidInputError("layers must be a positive integer.", "layers");
  }
  if (!Number.isInteger(config.seed)) {
    throw new InvalidInputError("seed must be an integer.", "seed");
  }

  return deepFreeze(config);
}

function parseIntegerEnv(
  env: NodeJS.ProcessEnv,
  key: string
): number | undefined {
  const raw = env[key]?.trim();
  if (!raw) return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new InvalidInputError(`${key} must be an integer.`, key);
  }
  return value;
}

function parseSimulatorEnv(env: NodeJS.ProcessEnv): SimulatorKind | undefined {
  const raw = env.ANCESTRY_SIMULATOR?.trim().toLowerCase();
  if (!raw) return undefined;
  if (raw === "statevector" || raw === "none") return raw;

  throw new InvalidInputError(
    "ANCESTRY_SIMULATOR must be 'statevector' or 'none'.",
    "ANCESTRY_SIMULATOR"
  );
}

export function loadResolverConfig(
  env: NodeJS.ProcessEnv = process.env
): ResolverConfig {
  const overrides: {
    -readonly [K in keyof ResolverConfigOverrides]: ResolverConfigOverrides[K];
  } = {};

  const simulator = parseSimulatorEnv(env);
  const shots = parseIntegerEnv(env, "ANCESTRY_SHOTS");
  const layers = parseIntegerEnv(env, "ANCESTRY_LAYERS");
  const seed = parseIntegerEnv(env, "ANCESTRY_SEED");

  if (simulator !== undefined) overrides.simulator = simulator;
  if (shots !== undefined) overrides.shots = shots;
  if (layers !== undefined) overrides.layers = layers;
  if (seed !== undefined) overrides.seed = seed;

  return createResolverConfig(overrides);
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
