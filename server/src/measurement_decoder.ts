import { SimulationExecutionError } from "./errors";
import {
  ethnicGroupAt,
  regionAt,
  timePeriodAt,
  type KnowledgeBase,
} from "./knowledge_base";
import { PATHWAY_LAYOUT, type BitField } from "./pathway_circuit";
import type { Distribution, MeasurementCounts, PathwayResult } from "./types";

const BITSTRING = /^[01]+$/;

export function extractField(outcome: number, field: BitField): number {
  return (outcome >>> field.offset) & ((1 << field.width) - 1);
}

function parseOutcome(bitstring: string): number {
  if (bitstring.length !== PATHWAY_LAYOUT.qubits || !BITSTRING.test(bitstring)) {
    throw new SimulationExecutionError(
      `Malformed measurement outcome "${bitstring}"`,
      "sampling"
    );
  }
  return parseInt(bitstring, 2);
}

/**
 * `1 - H / Hmax` over the outcome counts, base 2. A single distinct
 * outcome leaves Hmax at 0 and scores 0.5.
 */
export function coherenceFromCounts(counts: readonly number[], total: number): number {
  const distinct = counts.length;
  const maxEntropy = Math.log2(distinct);
  if (!(maxEntropy > 0)) return 0.5;

  let entropy = 0;
  for (const count of counts) {
    if (count <= 0) continue;
    const p = count / total;
    entropy -= p * Math.log2(p);
  }

  return Math.min(1, Math.max(0, 1 - entropy / maxEntropy));
}

function accumulate(dist: Distribution, label: string, count: number): void {
  dist[label] = (dist[label] ?? 0) + count;
}

export function decodeMeasurements(
  counts: Readonly<MeasurementCounts>,
  kb: KnowledgeBase
): PathwayResult {
  const entries = Object.entries(counts);
  if (entries.length === 0) {
    throw new SimulationExecutionError("No measurement outcomes", "sampling");
  }

  let total = 0;
  for (const [bitstring, count] of entries) {
    if (!Number.isInteger(count) || count < 0) {
      throw new SimulationExecutionError(
        `Invalid shot count ${count} for outcome "${bitstring}"`,
        "sampling"
      );
    }
    total += count;
  }
  if (total <= 0) {
    throw new SimulationExecutionError("Measurement counts sum to zero", "sampling");
  }

  const regionDist: Distribution = {};
  const ethnicDist: Distribution = {};
  const timeDist: Distribution = {};
  const observed: number[] = [];

  for (const [bitstring, count] of entries) {
    const outcome = parseOutcome(bitstring);
    if (count === 0) continue;
    observed.push(count);

    accumulate(regionDist, regionAt(kb, extractField(outcome, PATHWAY_LAYOUT.region)), count);
    accumulate(ethnicDist, ethnicGroupAt(kb, extractField(outcome, PATHWAY_LAYOUT.ethnic)), count);
    accumulate(timeDist, timePeriodAt(kb, extractField(outcome, PATHWAY_LAYOUT.time)), count);
  }

  for (const dist of [regionDist, ethnicDist, timeDist]) {
    for (const label of Object.keys(dist)) dist[label] /= total;
  }

  return {
    backend: "sampling",
    regionDist,
    ethnicDist,
    timeDist,
    coherence: coherenceFromCounts(observed, total),
  };
}
