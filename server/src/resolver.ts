/**
 * resolver.ts
 *
 * Entry point of the resolution pipeline:
 *
 *   input → classical baseline → pathway backend → synthesis → result
 *
 * A resolver captures its configuration, knowledge base, and backend once.
 * `resolve` is synchronous and keeps no state between calls, so a single
 * instance may serve any number of concurrent callers.
 */

import { scoreClassical } from "./classical_scorer";
import { DEFAULT_RESOLVER_CONFIG, type ResolverConfig } from "./config";
import { InvalidInputError, SimulationExecutionError, type ResolverError } from "./errors";
import { getKnowledgeBase, type KnowledgeBase } from "./knowledge_base";
import { normalizeAncestralInput } from "./normalize_input";
import {
  runPathway,
  selectPathwayBackend,
  type PathwayBackend,
} from "./pathway_backend";
import { synthesizeResult } from "./result_synthesizer";
import type { CircuitExecutor } from "./statevector";
import type {
  AncestralInput,
  AncestralResult,
  ClassicalScore,
  Distribution,
  PathwayResult,
} from "./types";

export type ResolutionTrace = {
  backend: PathwayBackend["kind"];
  baseline: ClassicalScore;
  pathway: PathwayResult;
  combined: Distribution;
};

export type ResolveOutcome =
  | { ok: true; result: AncestralResult; trace: ResolutionTrace }
  | { ok: false; error: ResolverError };

export type Resolver = {
  readonly config: ResolverConfig;
  readonly knowledgeBase: KnowledgeBase;
  readonly backend: PathwayBackend["kind"];
  resolve(input: AncestralInput): ResolveOutcome;
};

export type CreateResolverOptions = {
  config?: ResolverConfig;
  knowledgeBase?: KnowledgeBase;
  /** Replaces the built-in state-vector executor. */
  executor?: CircuitExecutor | null;
  /** Injects a backend directly, bypassing selection. */
  backend?: PathwayBackend;
};

function runPipeline(
  input: AncestralInput,
  kb: KnowledgeBase,
  config: ResolverConfig,
  backend: PathwayBackend
): ResolveOutcome {
  // Inputs built elsewhere still go through the boundary checks.
  const normalized = normalizeAncestralInput(input);

  const baseline = scoreClassical(normalized, kb, config);
  const pathway = runPathway(backend, baseline, kb, config);
  const { result, combined } = synthesizeResult(
    normalized,
    baseline,
    pathway,
    kb,
    config
  );

  return {
    ok: true,
    result,
    trace: { backend: backend.kind, baseline, pathway, combined },
  };
}

export function createResolver(options: CreateResolverOptions = {}): Resolver {
  const config = options.config ?? DEFAULT_RESOLVER_CONFIG;
  const knowledgeBase = options.knowledgeBase ?? getKnowledgeBase();
  const backend =
    options.backend ?? selectPathwayBackend(config, options.executor);

  return Object.freeze({
    config,
    knowledgeBase,
    backend: backend.kind,
    resolve(input: AncestralInput): ResolveOutcome {
      try {
        return runPipeline(input, knowledgeBase, config, backend);
      } catch (err) {
        if (err instanceof InvalidInputError || err instanceof SimulationExecutionError) {
          return { ok: false, error: err };
        }
        throw err;
      }
    },
  });
}

/**
 * Throwing variant for callers that prefer exceptions.
 */
export function resolveOrThrow(resolver: Resolver, input: AncestralInput): AncestralResult {
  const outcome = resolver.resolve(input);
  if (!outcome.ok) throw outcome.error;
  return outcome.result;
}
