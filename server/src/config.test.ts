import { describe, expect, it } from "vitest";
import { createResolverConfig, DEFAULT_RESOLVER_CONFIG, loadResolverConfig } from "./config";
import { InvalidInputError } from "./errors";

describe("resolver config", () => {
  it("defaults to the state-vector simulator", () => {
    const config = loadResolverConfig({});
    expect(config).toEqual(DEFAULT_RESOLVER_CONFIG);
    expect(config.simulator).toBe("statevector");
    expect(config.shots).toBe(8192);
    expect(config.layers).toBe(6);
  });

  it("reads overrides from the environment", () => {
    const config = loadResolverConfig({
      ANCESTRY_SIMULATOR: " None ",
      ANCESTRY_SHOTS: "512",
      ANCESTRY_LAYERS: "2",
      ANCESTRY_SEED: "7",
    });
    expect(config).toMatchObject({ simulator: "none", shots: 512, layers: 2, seed: 7 });
    expect(config.classicalWeights).toEqual(DEFAULT_RESOLVER_CONFIG.classicalWeights);
  });

  it("rejects unknown simulators and bad numbers", () => {
    expect(() => loadResolverConfig({ ANCESTRY_SIMULATOR: "aer" })).toThrow(
      InvalidInputError
    );
    expect(() => loadResolverConfig({ ANCESTRY_SHOTS: "many" })).toThrow(
      "ANCESTRY_SHOTS must be an integer."
    );
    expect(() => createResolverConfig({ shots: 0 })).toThrow(
      "shots must be a positive integer."
    );
    expect(() => createResolverConfig({ layers: 1.5 })).toThrow(
      "layers must be a positive integer."
    );
  });

  it("returns frozen configs", () => {
    const config = createResolverConfig({ shots: 64 });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.fallback)).toBe(true);
    expect(Object.isFrozen(DEFAULT_RESOLVER_CONFIG)).toBe(true);
  });
});
