import { batch, createAtom, createObservedAtom } from "../preact";
import type { AtomNode, ObservedAtomNode } from "../preact";
import { IndexAtomMap } from "./NodeMap";

/**
 * Change tracking for one collection's backing array.
 *
 * `atom` is read by every observing access so the administration knows when
 * it stops being watched; `keysAtom` follows the length; `indexAtoms` follow
 * single slots read through `get`; `contentsAtom` is read by whole-collection
 * reads and changes on any mutation.
 */
export class Administration<T> {
	readonly source: T[];
	readonly atom: ObservedAtomNode;
	readonly keysAtom: AtomNode;
	readonly indexAtoms: IndexAtomMap;
	private contentsAtom?: AtomNode;

	/** Incremented on every mutation, observed or not. */
	version = 0;

	constructor(source: T[] = []) {
		this.source = source;
		this.atom = createObservedAtom();
		this.keysAtom = createAtom();
		this.indexAtoms = new IndexAtomMap(this.atom);
	}

	reportObserved(): void {
		this.atom.reportObserved();
		if (!this.contentsAtom) {
			this.contentsAtom = createAtom();
		}
		this.contentsAtom.reportObserved();
	}

	reportLengthObserved(): void {
		this.atom.reportObserved();
		this.keysAtom.reportObserved();
	}

	reportIndexObserved(index: number): void {
		this.atom.reportObserved();
		this.indexAtoms.reportObserved(index);
	}

	/**
	 * Notify observers of a mutation covering `[index, index + count)`.
	 * Omitting `index` marks every observed slot as changed.
	 */
	onChanged(lengthChanged: boolean, index?: number, count?: number): void {
		this.version++;

		batch(() => {
			if (lengthChanged) {
				this.keysAtom.reportChanged();
			}

			if (index == null) {
				for (const key of this.indexAtoms.keys()) {
					this.indexAtoms.reportChanged(key);
				}
			} else if (count !== undefined && count > 0) {
				// Only walk the observed indices, not the whole range.
				const end = index + count;
				for (const key of this.indexAtoms.keys()) {
					if (key >= index && key < end) {
						this.indexAtoms.reportChanged(key);
					}
				}
			}

			this.contentsAtom?.reportChanged();
		});
	}
}
