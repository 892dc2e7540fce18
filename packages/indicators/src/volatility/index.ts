export {
	GARMAN_KLASS_DEFAULTS,
	type GarmanKlassParams,
	garmanKlassVariance,
	garmanKlassVolatility,
	TRADING_DAYS_PER_YEAR,
} from "./garmanKlass.js";
