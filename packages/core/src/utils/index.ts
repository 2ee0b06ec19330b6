export { computeHash, verifyHash } from "./hash.js";
export {
	createRandomIdentity,
	createSequentialIdentity,
	generateAccountNumber,
	generateId,
} from "./id.js";
export { hashLockKey, lockOrder } from "./lock.js";
export {
	DEFAULT_CURRENCY,
	getCurrencyPrecision,
	getDecimalPlaces,
	minorToDecimal,
	parseScaledDecimal,
	toMinorUnits,
} from "./money.js";
