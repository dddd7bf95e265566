import type { ResolverConfig } from "./config";
import type { Distribution } from "./types";

/* ============================================================================
   Register layout
   ============================================================================ */

export type BitField = {
  /** Lowest qubit of the field. */
  readonly offset: number;
  readonly width: number;
};

/**
 * 16 qubits, lowest first. The surname field is reserved; nothing
 * downstream decodes it.
 */
export const PATHWAY_LAYOUT = {
  qubits: 16,
  surname: { offset: 0, width: 5 },
  region: { offset: 5, width: 4 },
  ethnic: { offset: 9, width: 4 },
  time: { offset: 13, width: 3 },
} as const satisfies Record<string, BitField | number>;

export function fieldQubits(field: BitField): number[] {
  return Array.from({ length: field.width }, (_, i) => field.offset + i);
}

/* ============================================================================
   Circuit description
   ============================================================================ */

export type Gate =
  | { op: "h"; target: number }
  | { op: "x"; target: number }
  | { op: "p"; target: number; theta: number }
  | { op: "rz"; target: number; theta: number }
  | { op: "rx"; target: number; theta: number }
  | { op: "cz"; control: number; target: number }
  | { op: "mcx"; controls: number[]; target: number };

export type PathwayCircuit = {
  qubits: number;
  gates: Gate[];
};

function onAll(qubits: number, op: "h" | "x"): Gate[] {
  return Array.from({ length: qubits }, (_, target): Gate => ({ op, target }));
}

/**
 * Cost layer: couples every surname qubit to every region qubit, then
 * phases the ethnic field at a reduced angle.
 */
function costLayer(gamma: number, ethnicScale: number): Gate[] {
  const gates: Gate[] = [];

  for (const control of fieldQubits(PATHWAY_LAYOUT.surname)) {
    for (const target of fieldQubits(PATHWAY_LAYOUT.region)) {
      gates.push({ op: "cz", control, target });
      gates.push({ op: "rz", target, theta: gamma });
    }
  }

  for (const target of fieldQubits(PATHWAY_LAYOUT.ethnic)) {
    gates.push({ op: "rz", target, theta: gamma * ethnicScale });
  }

  return gates;
}

function mixerLayer(beta: number): Gate[] {
  return Array.from({ length: PATHWAY_LAYOUT.qubits }, (_, target) => ({
    op: "rx" as const,
    target,
    theta: beta,
  }));
}

/**
 * Phase-flip marking on the region qubit of each strong baseline region,
 * followed by an inversion-about-the-mean over the full register.
 */
function amplitudeBoost(
  encoded: ReadonlyArray<[string, number]>,
  threshold: number
): Gate[] {
  const gates: Gate[] = [];

  encoded.forEach(([, probability], i) => {
    if (probability <= threshold) return;
    const target = PATHWAY_LAYOUT.region.offset + i;
    gates.push(
      { op: "x", target },
      { op: "h", target },
      { op: "x", target },
      { op: "h", target }
    );
  });

  const n = PATHWAY_LAYOUT.qubits;
  const last = n - 1;

  gates.push(...onAll(n, "h"), ...onAll(n, "x"));
  gates.push({ op: "h", target: last });
  gates.push({
    op: "mcx",
    controls: Array.from({ length: last }, (_, i) => i),
    target: last,
  });
  gates.push({ op: "h", target: last });
  gates.push(...onAll(n, "x"), ...onAll(n, "h"));

  return gates;
}

export function buildPathwayCircuit(
  regionalProbabilities: Readonly<Distribution>,
  config: ResolverConfig
): PathwayCircuit {
  const { encodedRegions, boostThreshold, ethnicPhaseScale } = config.circuit;
  // With five encoded regions the last phase lands on the first ethnic qubit.
  const encoded = Object.entries(regionalProbabilities).slice(
    0,
    Math.min(encodedRegions, PATHWAY_LAYOUT.qubits - PATHWAY_LAYOUT.region.offset)
  );

  const gates: Gate[] = [...onAll(PATHWAY_LAYOUT.qubits, "h")];

  encoded.forEach(([, probability], i) => {
    gates.push({
      op: "p",
      target: PATHWAY_LAYOUT.region.offset + i,
      theta: probability * Math.PI,
    });
  });

  const gamma = Math.PI / (2 * config.layers);
  const beta = Math.PI / (4 * config.layers);

  for (let layer = 0; layer < config.layers; layer += 1) {
    gates.push(...costLayer(gamma, ethnicPhaseScale));
    gates.push(...mixerLayer(beta));
  }

  gates.push(...amplitudeBoost(encoded, boostThreshold));

  return { qubits: PATHWAY_LAYOUT.qubits, gates };
}
