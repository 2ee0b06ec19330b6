import { FiscusError } from "../error/index.js";

// =============================================================================
// MAJOR -> MINOR CONVERSION
// =============================================================================
// The engine only ever sees integer minor units. `toMinorUnits` is the one
// place a decimal amount is rounded: the decimal text is parsed digit by digit
// (no binary floating-point arithmetic) and rounded half away from zero at the
// currency's precision.

/** Currency used when the options name none. */
export const DEFAULT_CURRENCY = "USD";

const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?$/;
const EXPONENT_PATTERN = /^([+-]?)(\d+)(?:\.(\d*))?e([+-]?\d+)$/i;
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/** Rewrite "1.5e-7" style text as plain positional notation. */
function expandExponent(text: string): string {
	const match = EXPONENT_PATTERN.exec(text);
	if (!match) return text;
	const [, sign = "", int = "", frac = "", exp = "0"] = match;
	const digits = int + frac;
	const point = int.length + Number(exp);
	if (point <= 0) return `${sign}0.${"0".repeat(-point)}${digits}`;
	if (point >= digits.length) return `${sign}${digits}${"0".repeat(point - digits.length)}`;
	return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Parse a decimal number or string into an integer scaled by 10^scale,
 * rounding half away from zero on the first dropped digit.
 * Returns null when the input is not a finite decimal.
 *
 * parseScaledDecimal("6.25", 4) -> 62500n
 * parseScaledDecimal(0.125, 2)  -> 13n
 */
export function parseScaledDecimal(value: number | string, scale: number): bigint | null {
	if (typeof value === "number" && !Number.isFinite(value)) return null;
	const text = expandExponent(String(value).trim());
	const match = DECIMAL_PATTERN.exec(text);
	if (!match) return null;

	const whole = match[2] ?? "";
	const fraction = match[3] ?? "";
	if (whole === "" && fraction === "") return null;

	const kept = fraction.slice(0, scale).padEnd(scale, "0");
	const firstDropped = fraction.charAt(scale);
	let magnitude = BigInt(`${whole || "0"}${kept}`);
	if (firstDropped !== "" && firstDropped >= "5") {
		magnitude += 1n;
	}
	return match[1] === "-" ? -magnitude : magnitude;
}

/**
 * Convert a major-unit amount (e.g. 1500.5 dollars) to minor units (150050 cents).
 * Throws INVALID_AMOUNT for malformed input or results outside the safe integer range.
 */
export function toMinorUnits(major: number | string, currency = DEFAULT_CURRENCY): number {
	const minor = parseScaledDecimal(major, getDecimalPlaces(currency));
	if (minor === null) {
		throw FiscusError.invalidAmount(`Malformed amount "${String(major)}"`);
	}
	if (minor > MAX_SAFE || minor < -MAX_SAFE) {
		throw FiscusError.invalidAmount(`Amount ${String(major)} is out of range`);
	}
	return Number(minor);
}

// =============================================================================
// MINOR -> DISPLAY
// =============================================================================

/**
 * Convert smallest units (paise/cents) to decimal string.
 * 25490 -> "254.90"
 */
export function minorToDecimal(amount: number, currency = DEFAULT_CURRENCY): string {
	const precision = getCurrencyPrecision(currency);
	const major = amount / precision;
	const decimals = getDecimalPlaces(currency);
	return major.toFixed(decimals);
}

/**
 * Get precision (subunit count) for a currency.
 * INR -> 100 (100 paise = 1 rupee)
 * JPY -> 1
 */
export function getCurrencyPrecision(currency: string): number {
	return 10 ** getDecimalPlaces(currency);
}

/**
 * Get decimal places for display.
 */
export function getDecimalPlaces(currency: string): number {
	switch (currency) {
		case "JPY":
		case "KRW":
			return 0;
		case "BHD":
		case "KWD":
		case "OMR":
			return 3;
		default:
			return 2;
	}
}
