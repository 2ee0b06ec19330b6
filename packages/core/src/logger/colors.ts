// =============================================================================
// ANSI color helpers -- respects NO_COLOR, FORCE_COLOR and non-TTY streams
// =============================================================================

function colorsEnabled(): boolean {
	if (typeof process === "undefined") return false;
	if (process.env.NO_COLOR) return false;
	if (process.env.FORCE_COLOR && process.env.FORCE_COLOR !== "0") return true;
	return process.stdout?.isTTY === true;
}

export type Paint = (s: string) => string;

function wrap(code: number, closeCode: number, enabled: boolean): Paint {
	return enabled ? (s: string) => `\x1b[${code}m${s}\x1b[${closeCode}m` : (s: string) => s;
}

export interface Palette {
	bold: Paint;
	dim: Paint;
	red: Paint;
	yellow: Paint;
	blue: Paint;
	magenta: Paint;
}

export function createPalette(enabled: boolean = colorsEnabled()): Palette {
	return {
		bold: wrap(1, 22, enabled),
		dim: wrap(2, 22, enabled),
		red: wrap(31, 39, enabled),
		yellow: wrap(33, 39, enabled),
		blue: wrap(34, 39, enabled),
		magenta: wrap(35, 39, enabled),
	};
}
