import { describe, expect, it } from "vitest";
import type { PathwayCircuit } from "./pathway_circuit";
import { createStatevectorExecutor, probabilities, simulateState } from "./statevector";

const circuit = (qubits: number, gates: PathwayCircuit["gates"]): PathwayCircuit => ({
  qubits,
  gates,
});

describe("simulateState", () => {
  it("starts in the all-zero state", () => {
    const probs = probabilities(simulateState(circuit(2, [])));
    expect(Array.from(probs)).toEqual([1, 0, 0, 0]);
  });

  it("applies single-qubit gates to the addressed bit", () => {
    const probs = probabilities(simulateState(circuit(2, [{ op: "x", target: 1 }])));
    expect(probs[2]).toBeCloseTo(1, 12);
  });

  it("rx(pi) flips a qubit and rz leaves probabilities alone", () => {
    const probs = probabilities(
      simulateState(
        circuit(1, [
          { op: "rx", target: 0, theta: Math.PI },
          { op: "rz", target: 0, theta: 0.7 },
        ])
      )
    );
    expect(probs[0]).toBeCloseTo(0, 12);
    expect(probs[1]).toBeCloseTo(1, 12);
  });

  it("H p(pi) H acts as a bit flip", () => {
    const probs = probabilities(
      simulateState(
        circuit(1, [
          { op: "h", target: 0 },
          { op: "p", target: 0, theta: Math.PI },
          { op: "h", target: 0 },
        ])
      )
    );
    expect(probs[1]).toBeCloseTo(1, 12);
  });

  it("entangles through cz and mcx", () => {
    const viaCz = probabilities(
      simulateState(
        circuit(2, [
          { op: "h", target: 0 },
          { op: "h", target: 1 },
          { op: "cz", control: 0, target: 1 },
          { op: "h", target: 1 },
        ])
      )
    );
    const viaMcx = probabilities(
      simulateState(
        circuit(2, [
          { op: "h", target: 0 },
          { op: "mcx", controls: [0], target: 1 },
        ])
      )
    );

    for (const probs of [viaCz, viaMcx]) {
      expect(probs[0]).toBeCloseTo(0.5, 12);
      expect(probs[1]).toBeCloseTo(0, 12);
      expect(probs[2]).toBeCloseTo(0, 12);
      expect(probs[3]).toBeCloseTo(0.5, 12);
    }
  });

  it("rejects out-of-range qubits and registers", () => {
    expect(() => simulateState(circuit(2, [{ op: "h", target: 2 }]))).toThrow(RangeError);
    expect(() => simulateState(circuit(0, []))).toThrow(RangeError);
    expect(() =>
      simulateState(circuit(2, [{ op: "mcx", controls: [1], target: 1 }]))
    ).toThrow("Qubit 1 is both control and target");
  });
});

describe("createStatevectorExecutor", () => {
  it("reports outcomes with the highest qubit first", () => {
    const executor = createStatevectorExecutor(1);
    expect(executor.run(circuit(2, [{ op: "x", target: 0 }]), 10)).toEqual({ "01": 10 });
    expect(executor.run(circuit(3, [{ op: "x", target: 2 }]), 4)).toEqual({ "100": 4 });
  });

  it("samples only reachable outcomes and spends every shot", () => {
    const counts = createStatevectorExecutor(42).run(
      circuit(2, [
        { op: "h", target: 0 },
        { op: "mcx", controls: [0], target: 1 },
      ]),
      1000
    );

    expect(Object.keys(counts).sort()).toEqual(["00", "11"]);
    expect(counts["00"] + counts["11"]).toBe(1000);
    expect(counts["00"]).toBeGreaterThan(400);
    expect(counts["11"]).toBeGreaterThan(400);
  });

  it("is reproducible for a fixed seed", () => {
    const uniform = circuit(3, [
      { op: "h", target: 0 },
      { op: "h", target: 1 },
      { op: "h", target: 2 },
    ]);
    const executor = createStatevectorExecutor(7);
    expect(executor.run(uniform, 256)).toEqual(executor.run(uniform, 256));
    expect(createStatevectorExecutor(7).run(uniform, 256)).toEqual(executor.run(uniform, 256));
  });

  it("rejects non-positive shot counts", () => {
    expect(() => createStatevectorExecutor(1).run(circuit(1, []), 0)).toThrow(RangeError);
  });
});
