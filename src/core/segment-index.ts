import type { SegmentGroupKey } from "../types";

interface Bucket<T> {
	key: SegmentGroupKey;
	items: T[];
}

/**
 * Buckets items by a structured (visitId, top, left, innerProcessed) key
 * using one nested map level per field, so no delimiter-joined string key
 * can collide. Buckets iterate in first-insertion order.
 */
export class SegmentIndex<T> {
	private levels = new Map<
		number,
		Map<number, Map<number, Map<string, Bucket<T>>>>
	>();
	private order: Bucket<T>[] = [];

	add(key: SegmentGroupKey, item: T): void {
		let byTop = this.levels.get(key.visitId);
		if (!byTop) {
			byTop = new Map();
			this.levels.set(key.visitId, byTop);
		}

		let byLeft = byTop.get(key.top);
		if (!byLeft) {
			byLeft = new Map();
			byTop.set(key.top, byLeft);
		}

		let byTemplate = byLeft.get(key.left);
		if (!byTemplate) {
			byTemplate = new Map();
			byLeft.set(key.left, byTemplate);
		}

		let bucket = byTemplate.get(key.innerProcessed);
		if (!bucket) {
			bucket = {
				key: {
					visitId: key.visitId,
					top: key.top,
					left: key.left,
					innerProcessed: key.innerProcessed,
				},
				items: [],
			};
			byTemplate.set(key.innerProcessed, bucket);
			this.order.push(bucket);
		}
		bucket.items.push(item);
	}

	get(key: SegmentGroupKey): readonly T[] | undefined {
		return this.levels
			.get(key.visitId)
			?.get(key.top)
			?.get(key.left)
			?.get(key.innerProcessed)?.items;
	}

	get size(): number {
		return this.order.length;
	}

	*entries(): IterableIterator<[SegmentGroupKey, readonly T[]]> {
		for (const bucket of this.order) {
			yield [bucket.key, bucket.items];
		}
	}
}
