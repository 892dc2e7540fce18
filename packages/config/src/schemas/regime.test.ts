import { describe, expect, it } from "vitest";
import { RegimeConfigSchema, RegimeDecoding } from "./regime.js";

describe("RegimeDecoding", () => {
	it("accepts smoothed and viterbi", () => {
		expect(RegimeDecoding.parse("smoothed")).toBe("smoothed");
		expect(RegimeDecoding.parse("viterbi")).toBe("viterbi");
	});
});

describe("RegimeConfigSchema", () => {
	it("applies default values", () => {
		const config = RegimeConfigSchema.parse({});
		expect(config.min_observations).toBe(30);
		expect(config.annualization_factor).toBe(252);
		expect(config.max_iterations).toBe(100);
		expect(config.tolerance).toBe(1e-8);
		expect(config.decoding).toBe("smoothed");
	});

	it("treats the observation floor as configurable above 10", () => {
		expect(RegimeConfigSchema.parse({ min_observations: 60 }).min_observations).toBe(60);
		expect(() => RegimeConfigSchema.parse({ min_observations: 5 })).toThrow();
	});
});
