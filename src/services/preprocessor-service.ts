import { collapseDigitRuns, extractDigits } from "../algorithms";
import type { PreprocessedObservation, SegmentObservation } from "../types";

export function preprocessObservation(
	observation: SegmentObservation,
): PreprocessedObservation {
	return {
		...observation,
		innerProcessed: collapseDigitRuns(observation.innerText),
		innerDigits: extractDigits(observation.innerText),
	};
}

export class PreprocessorService {
	preprocess(
		observations: readonly SegmentObservation[],
	): PreprocessedObservation[] {
		return observations.map(preprocessObservation);
	}
}
