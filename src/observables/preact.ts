import {
	computed,
	signal as preactSignal,
	Signal,
	batch,
	effect,
	untracked,
} from "@preact/signals-core";
import type { ReadonlySignal } from "@preact/signals-core";

export interface AtomNode {
	reportObserved(): void;
	reportChanged(): void;
}

export type ObservedAtomNode = AtomNode & {
	readonly observing: boolean;
	onObservedStateChange(callback: (observing: boolean) => void): () => void;
};

export function createObservedAtom(): ObservedAtomNode {
	let value = 0;
	const callbacks = new Set<(observing: boolean) => void>();
	let observing = false;

	const signal = new Signal(value, {
		watched() {
			observing = true;
			callbacks.forEach((callback) => callback(true));
		},
		unwatched() {
			observing = false;
			callbacks.forEach((callback) => callback(false));
		},
	});

	return {
		reportObserved() {
			signal.value;
		},
		reportChanged() {
			signal.value = ++value;
		},
		get observing() {
			return observing;
		},
		onObservedStateChange(callback: (observing: boolean) => void) {
			callbacks.add(callback);
			return () => {
				callbacks.delete(callback);
			};
		},
	};
}

export function createAtom(): AtomNode {
	let value = 0;
	const s = preactSignal(value);

	return {
		reportChanged() {
			s.value = ++value;
		},
		reportObserved() {
			s.value;
		},
	};
}

export { effect, batch, untracked, computed };
export type { ReadonlySignal };

export function reaction<T>(
	fn: () => T,
	callback: (value: T) => void
): () => void {
	let initialized = false;
	let currentValue: T;

	return effect(() => {
		const nextValue = fn();

		if (!initialized) {
			initialized = true;
			currentValue = nextValue;
			return;
		}

		if (Object.is(currentValue, nextValue)) {
			return;
		}

		currentValue = nextValue;

		untracked(() => {
			callback(nextValue);
		});
	});
}
