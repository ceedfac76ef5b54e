import { createAtom } from "../preact";
import type { AtomNode, ObservedAtomNode } from "../preact";

/**
 * Lazily created atoms, one per observed index. The map empties itself once
 * the owning collection is no longer observed by any effect.
 */
export class IndexAtomMap {
	private map: Map<number, AtomNode> | undefined;
	private readonly observedAtom: ObservedAtomNode;
	private cleanUpRegistered = false;

	constructor(observedAtom: ObservedAtomNode) {
		this.observedAtom = observedAtom;
	}

	private registerCleanup(): void {
		this.cleanUpRegistered = true;
		const unsub = this.observedAtom.onObservedStateChange((observing) => {
			if (!observing) {
				this.map?.clear();
				this.cleanUpRegistered = false;
				unsub();
			}
		});
	}

	get(index: number): AtomNode | undefined {
		return this.map?.get(index);
	}

	getOrCreate(index: number): AtomNode {
		let entry = this.map?.get(index);

		if (!entry) {
			this.map = this.map ?? new Map();
			entry = createAtom();

			if (!this.cleanUpRegistered) {
				this.registerCleanup();
			}

			this.map.set(index, entry);
		}

		return entry;
	}

	keys(): Iterable<number> {
		return this.map?.keys() ?? [];
	}

	get size(): number {
		return this.map?.size ?? 0;
	}

	reportObserved(index: number): void {
		this.getOrCreate(index).reportObserved();
	}

	reportChanged(index: number): void {
		this.get(index)?.reportChanged();
	}
}
