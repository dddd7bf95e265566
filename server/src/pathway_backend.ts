import type { ResolverConfig } from "./config";
import { describeError, SimulationExecutionError } from "./errors";
import { rankDistribution, toDistribution, tryNormalize } from "./distribution";
import {
  ethnicGroupForRegion,
  regionRank,
  type KnowledgeBase,
} from "./knowledge_base";
import { decodeMeasurements } from "./measurement_decoder";
import { buildPathwayCircuit } from "./pathway_circuit";
import { createStatevectorExecutor, type CircuitExecutor } from "./statevector";
import type {
  ClassicalScore,
  Distribution,
  MeasurementCounts,
  PathwayResult,
} from "./types";

/* ============================================================================
   Backend variants
   ============================================================================ */

export type SamplingBackend = {
  kind: "sampling";
  executor: CircuitExecutor;
};

export type FallbackBackend = {
  kind: "fallback";
};

export type PathwayBackend = SamplingBackend | FallbackBackend;

/**
 * Chosen once per resolver. A missing executor is a normal condition and
 * selects the fallback; it is never revisited per call.
 */
export function selectPathwayBackend(
  config: ResolverConfig,
  executor?: CircuitExecutor | null
): PathwayBackend {
  if (executor) return { kind: "sampling", executor };
  if (config.simulator === "none") return { kind: "fallback" };

  return { kind: "sampling", executor: createStatevectorExecutor(config.seed) };
}

/* ============================================================================
   Sampling
   ============================================================================ */

function runSampling(
  backend: SamplingBackend,
  classical: ClassicalScore,
  kb: KnowledgeBase,
  config: ResolverConfig
): PathwayResult {
  const circuit = buildPathwayCircuit(classical.regionalProbabilities, config);

  let counts: MeasurementCounts;
  try {
    counts = backend.executor.run(circuit, config.shots);
  } catch (err) {
    throw new SimulationExecutionError(
      `Executor "${backend.executor.name}" failed: ${describeError(err)}`,
      "sampling",
      err
    );
  }

  return decodeMeasurements(counts, kb);
}

/* ============================================================================
   Fallback
   ============================================================================ */

function sharpen(
  regional: Readonly<Distribution>,
  config: ResolverConfig
): Distribution {
  const { sharpenThreshold, sharpenExponent, suppressExponent } = config.fallback;
  const out: Distribution = {};

  for (const [region, p] of Object.entries(regional)) {
    out[region] = p ** (p > sharpenThreshold ? sharpenExponent : suppressExponent);
  }
  return out;
}

export function fallbackEthnicDistribution(
  region: string,
  kb: KnowledgeBase,
  config: ResolverConfig
): Distribution {
  const { primaryEthnicWeight, secondaryEthnicWeight, secondaryEthnicCount } =
    config.fallback;
  const primary = ethnicGroupForRegion(kb, region);

  const dist: Distribution = { [primary]: primaryEthnicWeight };
  kb.fallbackEthnicPool
    .filter(group => group !== primary)
    .slice(0, secondaryEthnicCount)
    .forEach(group => {
      dist[group] = secondaryEthnicWeight;
    });

  return dist;
}

function runFallback(
  classical: ClassicalScore,
  kb: KnowledgeBase,
  config: ResolverConfig
): PathwayResult {
  const regionDist = tryNormalize(sharpen(classical.regionalProbabilities, config));
  if (!regionDist) {
    throw new SimulationExecutionError(
      "Sharpened region distribution has no mass",
      "fallback"
    );
  }

  const ranked = rankDistribution(regionDist, label => regionRank(kb, label));
  const top = ranked[0];
  if (!top) {
    throw new SimulationExecutionError("No region to expand", "fallback");
  }

  const ethnicDist = tryNormalize(fallbackEthnicDistribution(top.name, kb, config));
  const timeDist = tryNormalize(kb.fallbackTimeDistribution);
  if (!ethnicDist || !timeDist) {
    throw new SimulationExecutionError(
      "Fallback ethnic or time table has no mass",
      "fallback"
    );
  }

  return {
    backend: "fallback",
    regionDist: toDistribution(ranked),
    ethnicDist,
    timeDist,
    coherence: config.fallback.coherence,
  };
}

/* ============================================================================
   Public API
   ============================================================================ */

export function runPathway(
  backend: PathwayBackend,
  classical: ClassicalScore,
  kb: KnowledgeBase,
  config: ResolverConfig
): PathwayResult {
  switch (backend.kind) {
    case "sampling":
      return runSampling(backend, classical, kb, config);
    case "fallback":
      return runFallback(classical, kb, config);
  }
}
