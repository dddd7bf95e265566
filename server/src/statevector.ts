/**
 * statevector.ts
 *
 * In-process simulation backend. Holds the full 2^n amplitude vector,
 * applies the circuit gate by gate, then draws seeded samples from the
 * final probabilities.
 *
 * Basis index bit `q` is qubit `q`. Sampled outcomes are reported as
 * bitstrings with the highest qubit first.
 */

import type { Gate, PathwayCircuit } from "./pathway_circuit";
import type { MeasurementCounts } from "./types";

export type CircuitExecutor = {
  readonly name: string;
  run(circuit: PathwayCircuit, shots: number): MeasurementCounts;
};

const MAX_QUBITS = 20;

/* ============================================================================
   State
   ============================================================================ */

export type StateVector = {
  qubits: number;
  re: Float64Array;
  im: Float64Array;
};

function zeroState(qubits: number): StateVector {
  const size = 1 << qubits;
  const re = new Float64Array(size);
  const im = new Float64Array(size);
  re[0] = 1;
  return { qubits, re, im };
}

function assertQubit(state: StateVector, q: number): void {
  if (!Number.isInteger(q) || q < 0 || q >= state.qubits) {
    throw new RangeError(`Qubit ${q} outside register of ${state.qubits}`);
  }
}

/* ============================================================================
   Gates
   ============================================================================ */

function hadamard(state: StateVector, q: number): void {
  const { re, im } = state;
  const mask = 1 << q;
  const s = Math.SQRT1_2;

  for (let i = 0; i < re.length; i += 1) {
    if (i & mask) continue;
    const j = i | mask;
    const ar = re[i], ai = im[i], br = re[j], bi = im[j];
    re[i] = (ar + br) * s;
    im[i] = (ai + bi) * s;
    re[j] = (ar - br) * s;
    im[j] = (ai - bi) * s;
  }
}

function pauliX(state: StateVector, q: number): void {
  const { re, im } = state;
  const mask = 1 << q;

  for (let i = 0; i < re.length; i += 1) {
    if (i & mask) continue;
    const j = i | mask;
    const tr = re[i], ti = im[i];
    re[i] = re[j];
    im[i] = im[j];
    re[j] = tr;
    im[j] = ti;
  }
}

/** Multiplies amplitudes with bit `q` clear by phase0 and set by phase1. */
function diagonal(
  state: StateVector,
  q: number,
  phase0: number,
  phase1: number
): void {
  const { re, im } = state;
  const mask = 1 << q;
  const c0 = Math.cos(phase0), s0 = Math.sin(phase0);
  const c1 = Math.cos(phase1), s1 = Math.sin(phase1);

  for (let i = 0; i < re.length; i += 1) {
    const c = i & mask ? c1 : c0;
    const s = i & mask ? s1 : s0;
    const r = re[i], m = im[i];
    re[i] = r * c - m * s;
    im[i] = r * s + m * c;
  }
}

function rotateX(state: StateVector, q: number, theta: number): void {
  const { re, im } = state;
  const mask = 1 << q;
  const c = Math.cos(theta / 2);
  const s = Math.sin(theta / 2);

  for (let i = 0; i < re.length; i += 1) {
    if (i & mask) continue;
    const j = i | mask;
    const ar = re[i], ai = im[i], br = re[j], bi = im[j];
    // [[c, -is], [-is, c]]
    re[i] = c * ar + s * bi;
    im[i] = c * ai - s * br;
    re[j] = c * br + s * ai;
    im[j] = c * bi - s * ar;
  }
}

function controlledZ(state: StateVector, control: number, target: number): void {
  const { re, im } = state;
  const mask = (1 << control) | (1 << target);

  for (let i = 0; i < re.length; i += 1) {
    if ((i & mask) === mask) {
      re[i] = -re[i];
      im[i] = -im[i];
    }
  }
}

function multiControlledX(
  state: StateVector,
  controls: readonly number[],
  target: number
): void {
  const { re, im } = state;
  const tmask = 1 << target;
  let cmask = 0;
  for (const c of controls) cmask |= 1 << c;

  if (cmask & tmask) {
    throw new RangeError(`Qubit ${target} is both control and target`);
  }

  for (let i = 0; i < re.length; i += 1) {
    if ((i & cmask) !== cmask || i & tmask) continue;
    const j = i | tmask;
    const tr = re[i], ti = im[i];
    re[i] = re[j];
    im[i] = im[j];
    re[j] = tr;
    im[j] = ti;
  }
}

export function applyGate(state: StateVector, gate: Gate): void {
  switch (gate.op) {
    case "h":
      assertQubit(state, gate.target);
      return hadamard(state, gate.target);
    case "x":
      assertQubit(state, gate.target);
      return pauliX(state, gate.target);
    case "p":
      assertQubit(state, gate.target);
      return diagonal(state, gate.target, 0, gate.theta);
    case "rz":
      assertQubit(state, gate.target);
      return diagonal(state, gate.target, -gate.theta / 2, gate.theta / 2);
    case "rx":
      assertQubit(state, gate.target);
      return rotateX(state, gate.target, gate.theta);
    case "cz":
      assertQubit(state, gate.control);
      assertQubit(state, gate.target);
      return controlledZ(state, gate.control, gate.target);
    case "mcx":
      gate.controls.forEach(c => assertQubit(state, c));
      assertQubit(state, gate.target);
      return multiControlledX(state, gate.controls, gate.target);
  }
}

/* ============================================================================
   Sampling
   ============================================================================ */

function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export function probabilities(state: StateVector): Float64Array {
  const out = new Float64Array(state.re.length);
  for (let i = 0; i < out.length; i += 1) {
    out[i] = state.re[i] * state.re[i] + state.im[i] * state.im[i];
  }
  return out;
}

function sampleCounts(
  state: StateVector,
  shots: number,
  next: () => number
): MeasurementCounts {
  const probs = probabilities(state);
  const cumulative = new Float64Array(probs.length);
  let running = 0;
  for (let i = 0; i < probs.length; i += 1) {
    running += probs[i];
    cumulative[i] = running;
  }

  if (!(running > 0) || !Number.isFinite(running)) {
    throw new Error("State vector has no probability mass");
  }

  const hits = new Map<number, number>();
  for (let shot = 0; shot < shots; shot += 1) {
    const r = next() * running;
    let lo = 0;
    let hi = cumulative.length - 1;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (cumulative[mid] > r) hi = mid;
      else lo = mid + 1;
    }
    hits.set(lo, (hits.get(lo) ?? 0) + 1);
  }

  const counts: MeasurementCounts = {};
  for (const [outcome, count] of hits) {
    counts[outcome.toString(2).padStart(state.qubits, "0")] = count;
  }
  return counts;
}

/* ============================================================================
   Executor
   ============================================================================ */

export function simulateState(circuit: PathwayCircuit): StateVector {
  if (
    !Number.isInteger(circuit.qubits) ||
    circuit.qubits < 1 ||
    circuit.qubits > MAX_QUBITS
  ) {
    throw new RangeError(
      `Register size ${circuit.qubits} outside 1..${MAX_QUBITS}`
    );
  }

  const state = zeroState(circuit.qubits);
  for (const gate of circuit.gates) applyGate(state, gate);
  return state;
}

/**
 * Each run restarts the generator from `seed`, so identical circuits give
 * identical counts.
 */
export function createStatevectorExecutor(seed: number): CircuitExecutor {
  return {
    name: "statevector",
    run(circuit, shots) {
      if (!Number.isInteger(shots) || shots < 1) {
        throw new RangeError(`Shot count ${shots} must be a positive integer`);
      }
      const state = simulateState(circuit);
      return sampleCounts(state, shots, mulberry32(seed));
    },
  };
}
