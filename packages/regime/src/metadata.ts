import type { RegimeMetadata, RegimeState, RegimeStateInfo } from "./types.js";

/**
 * Display metadata for regime bands. Frozen; callers get copies from getRegimeMetadata.
 */
export const REGIME_METADATA: Readonly<{
	label: string;
	states: Readonly<Record<RegimeState, Readonly<RegimeStateInfo>>>;
}> = Object.freeze({
	label: "Market Regime",
	states: Object.freeze({
		0: Object.freeze({
			name: "low-vol",
			label: "Low Volatility",
			color: "#007AFF",
			fill: "rgba(0, 122, 255, 0.1)",
			description: "Stable, range-bound market conditions",
		}),
		1: Object.freeze({
			name: "high-vol",
			label: "High Volatility",
			color: "#FF3B30",
			fill: "rgba(255, 59, 48, 0.1)",
			description: "Unstable, trending market conditions",
		}),
	}),
});

export function getRegimeMetadata(): RegimeMetadata {
	return {
		label: REGIME_METADATA.label,
		states: { 0: { ...REGIME_METADATA.states[0] }, 1: { ...REGIME_METADATA.states[1] } },
	};
}
