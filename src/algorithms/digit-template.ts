export const DIGIT_PLACEHOLDER = "*";

const DIGIT_RUN = /\p{Nd}+/gu;
const DIGIT = /\p{Nd}/gu;
const IS_DIGIT = /^\p{Nd}$/u;

const digitValues = new Map<string, string>();

/**
 * ASCII value of a decimal digit from any script. Unicode encodes every
 * Nd script as consecutive runs of 0-9, so the value is the offset from the
 * start of the run modulo 10.
 */
export function asciiDigit(char: string): string {
	const cached = digitValues.get(char);
	if (cached !== undefined) {
		return cached;
	}

	const codePoint = char.codePointAt(0) ?? 0;
	let start = codePoint;
	while (IS_DIGIT.test(String.fromCodePoint(start - 1))) {
		start--;
	}

	const value = String((codePoint - start) % 10);
	digitValues.set(char, value);
	return value;
}

/**
 * Replaces each maximal run of decimal digits with a single placeholder, so
 * "Ends in 10:09" and "Ends in 9:59" share the template "Ends in *:*".
 */
export function collapseDigitRuns(text: string): string {
	return text.replace(DIGIT_RUN, DIGIT_PLACEHOLDER);
}

export function extractDigits(text: string): string {
	return (text.match(DIGIT) ?? []).map(asciiDigit).join("");
}
