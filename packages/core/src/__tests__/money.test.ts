import { describe, expect, it } from "vitest";
import { FiscusError } from "../error/index.js";
import {
	getCurrencyPrecision,
	getDecimalPlaces,
	minorToDecimal,
	parseScaledDecimal,
	toMinorUnits,
} from "../utils/money.js";

describe("toMinorUnits", () => {
	it("converts whole major units", () => {
		expect(toMinorUnits(1500)).toBe(150000);
		expect(toMinorUnits("10000.00")).toBe(1000000);
	});

	it("keeps exact cents", () => {
		expect(toMinorUnits(3216.5)).toBe(321650);
		expect(toMinorUnits("0.01")).toBe(1);
	});

	it("rounds half away from zero on the decimal text", () => {
		expect(toMinorUnits(0.125)).toBe(13);
		expect(toMinorUnits(-0.125)).toBe(-13);
		expect(toMinorUnits("12.344")).toBe(1234);
		expect(toMinorUnits("12.345")).toBe(1235);
	});

	it("is not thrown off by binary floating point", () => {
		// 1.005 * 100 === 100.49999999999999 in floating point
		expect(toMinorUnits(1.005)).toBe(101);
		expect(toMinorUnits(2.675)).toBe(268);
	});

	it("uses the currency's precision", () => {
		expect(toMinorUnits(1500.5, "JPY")).toBe(1501);
		expect(toMinorUnits("1.2345", "BHD")).toBe(1235);
	});

	it("expands exponent notation", () => {
		expect(toMinorUnits(1e-7)).toBe(0);
		expect(toMinorUnits("1.5e3")).toBe(150000);
	});

	it("accepts surrounding whitespace and a plus sign", () => {
		expect(toMinorUnits(" +2.50 ")).toBe(250);
	});

	it.each(["", ".", "abc", "1,000", "1.2.3", "--1"])("rejects malformed input %j", (input) => {
		expect(() => toMinorUnits(input)).toThrow(FiscusError);
		try {
			toMinorUnits(input);
		} catch (error) {
			expect(FiscusError.isCode(error, "INVALID_AMOUNT")).toBe(true);
		}
	});

	it("rejects non-finite numbers", () => {
		expect(() => toMinorUnits(Number.NaN)).toThrow(/Malformed amount/);
		expect(() => toMinorUnits(Number.POSITIVE_INFINITY)).toThrow(/Malformed amount/);
	});

	it("rejects results beyond the safe integer range", () => {
		expect(() => toMinorUnits(1e21)).toThrow(/out of range/);
	});
});

describe("parseScaledDecimal", () => {
	it("scales rates to 4 decimal places", () => {
		expect(parseScaledDecimal("6.25", 4)).toBe(62500n);
		expect(parseScaledDecimal(6, 4)).toBe(60000n);
		expect(parseScaledDecimal("0.00005", 4)).toBe(1n);
	});

	it("returns null for malformed input", () => {
		expect(parseScaledDecimal("six", 4)).toBeNull();
		expect(parseScaledDecimal(Number.NaN, 4)).toBeNull();
	});
});

describe("minorToDecimal", () => {
	it("formats USD with 2 decimal places", () => {
		expect(minorToDecimal(321600, "USD")).toBe("3216.00");
	});

	it("formats JPY with 0 decimal places", () => {
		expect(minorToDecimal(10000, "JPY")).toBe("10000");
	});

	it("formats BHD with 3 decimal places", () => {
		expect(minorToDecimal(10000, "BHD")).toBe("10.000");
	});

	it("handles zero and negatives", () => {
		expect(minorToDecimal(0)).toBe("0.00");
		expect(minorToDecimal(-500)).toBe("-5.00");
	});
});

describe("getCurrencyPrecision / getDecimalPlaces", () => {
	it("agree with each other", () => {
		expect(getCurrencyPrecision("USD")).toBe(100);
		expect(getCurrencyPrecision("JPY")).toBe(1);
		expect(getCurrencyPrecision("KWD")).toBe(1000);
		expect(getDecimalPlaces("INR")).toBe(2);
	});
});
