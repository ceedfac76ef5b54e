import { Administration } from "../observables/internal/Administration";
import {
	defaultEquals,
	naturalCompare,
	toDisplayString,
	toLocaleDisplayString,
} from "../observables/internal/utils";
import { reportMutationDuringTraversal } from "../config";
import { IndexOutOfRangeError } from "../errors";
import {
	isValidIndex,
	relativeIndex,
	resolveCopyWithin,
	resolveRange,
	toInteger,
} from "../indices";
import type {
	CollectionOptions,
	Comparator,
	Mapper,
	Predicate,
	Reducer,
	Visitor,
} from "../types";

/**
 * An ordered, 0-indexed sequence with the operations of a scripting-language
 * array.
 *
 * Region operations (`slice`, `splice`, `fill`, `copyWithin`) accept negative
 * indices, counted from the end, and clamp out-of-range bounds. Direct access
 * through `get`/`set` takes no normalization and throws
 * {@link IndexOutOfRangeError} outside `[0, length)`.
 *
 * Traversals snapshot `length` when they start. A callback that mutates the
 * collection it is traversing gets unguaranteed results.
 *
 * Reads are tracked by `@preact/signals-core`, so a collection read inside an
 * `effect` or `computed` re-runs it when the collection changes.
 */
export class OrderedCollection<T> implements Iterable<T> {
	private readonly adm: Administration<T>;
	private readonly options: CollectionOptions<T>;

	constructor(items: Iterable<T> = [], options: CollectionOptions<T> = {}) {
		this.adm = new Administration(Array.from(items));
		this.options = options;
	}

	static of<T>(...items: T[]): OrderedCollection<T> {
		return new OrderedCollection(items);
	}

	static from<T>(
		items: Iterable<T>,
		options?: CollectionOptions<T>
	): OrderedCollection<T> {
		return new OrderedCollection(items, options);
	}

	/**
	 * A collection of `length` slots all holding `value`.
	 */
	static sized<T>(length: number, value: T): OrderedCollection<T> {
		if (!Number.isInteger(length) || length < 0) {
			throw new RangeError(
				`ordered-collection: invalid collection length ${length}.`
			);
		}

		return new OrderedCollection(new Array<T>(length).fill(value));
	}

	private derive(items: Iterable<T>): OrderedCollection<T> {
		return new OrderedCollection(items, this.options);
	}

	get length(): number {
		const adm = this.adm;
		adm.reportLengthObserved();
		return adm.source.length;
	}

	// ---------------------------------------------------------------------
	// Basic access & mutation

	get(index: number): T {
		const adm = this.adm;
		if (!isValidIndex(index, adm.source.length)) {
			throw new IndexOutOfRangeError(index, adm.source.length);
		}

		adm.reportIndexObserved(index);
		return adm.source[index];
	}

	set(index: number, value: T): void {
		const adm = this.adm;
		if (!isValidIndex(index, adm.source.length)) {
			throw new IndexOutOfRangeError(index, adm.source.length);
		}

		if (Object.is(adm.source[index], value)) {
			return;
		}

		adm.source[index] = value;
		adm.onChanged(false, index, 1);
	}

	/**
	 * Relative read: negative indices count from the end. Out of range yields
	 * `undefined`.
	 */
	at(index: number): T | undefined {
		const adm = this.adm;
		const length = adm.source.length;
		const relative = toInteger(index);
		const resolved = relative < 0 ? length + relative : relative;

		if (resolved < 0 || resolved >= length) {
			adm.reportLengthObserved();
			return undefined;
		}

		adm.reportIndexObserved(resolved);
		return adm.source[resolved];
	}

	push(...items: T[]): number {
		this.spliceItems(this.adm.source.length, 0, items);
		return this.adm.source.length;
	}

	pop(): T | undefined {
		const adm = this.adm;
		if (adm.source.length === 0) {
			return undefined;
		}

		return this.spliceItems(adm.source.length - 1, 1, [])[0];
	}

	shift(): T | undefined {
		if (this.adm.source.length === 0) {
			return undefined;
		}

		return this.spliceItems(0, 1, [])[0];
	}

	unshift(...items: T[]): number {
		this.spliceItems(0, 0, items);
		return this.adm.source.length;
	}

	insert(index: number, item: T): void {
		this.splice(index, 0, item);
	}

	insertRange(index: number, items: Iterable<T>): void {
		const length = this.adm.source.length;
		this.spliceItems(relativeIndex(index, length), 0, Array.from(items));
	}

	add(item: T): void {
		this.push(item);
	}

	addRange(items: Iterable<T>): void {
		this.spliceItems(this.adm.source.length, 0, Array.from(items));
	}

	clear(): void {
		this.spliceItems(0, this.adm.source.length, []);
	}

	/**
	 * Removes the first element equal to `item`.
	 */
	remove(item: T): boolean {
		const index = this.indexOf(item);
		if (index === -1) {
			return false;
		}

		this.spliceItems(index, 1, []);
		return true;
	}

	removeAt(index: number): T {
		const adm = this.adm;
		if (!isValidIndex(index, adm.source.length)) {
			throw new IndexOutOfRangeError(index, adm.source.length);
		}

		return this.spliceItems(index, 1, [])[0];
	}

	// ---------------------------------------------------------------------
	// Region operations

	slice(start?: number, end?: number): OrderedCollection<T> {
		const adm = this.adm;
		adm.reportObserved();

		const [from, to] = resolveRange(adm.source.length, start, end);
		return this.derive(adm.source.slice(from, to));
	}

	/**
	 * Removes `deleteCount` elements at `start` and inserts `items` in their
	 * place. Returns the removed elements.
	 */
	splice(
		start: number,
		deleteCount: number = 0,
		...items: T[]
	): OrderedCollection<T> {
		const length = this.adm.source.length;
		const index = relativeIndex(start, length);
		const count = Math.max(
			0,
			Math.min(toInteger(deleteCount), length - index)
		);

		return this.derive(this.spliceItems(index, count, items));
	}

	private spliceItems(index: number, deleteCount: number, items: T[]): T[] {
		const adm = this.adm;
		const length = adm.source.length;

		// Removal set is taken against the pre-mutation indices.
		const removed = adm.source.slice(index, index + deleteCount);
		const tail = adm.source.slice(index + deleteCount);

		// `items` may exceed the engine's argument limit, so no spread.
		adm.source.length = index;
		for (const item of items) {
			adm.source.push(item);
		}
		for (const item of tail) {
			adm.source.push(item);
		}

		if (deleteCount !== 0 || items.length !== 0) {
			const shift = items.length - deleteCount;
			const reindexing = shift !== 0 && index + deleteCount < length;
			const count = reindexing
				? Number.POSITIVE_INFINITY
				: Math.max(deleteCount, items.length);

			adm.onChanged(length !== adm.source.length, index, count);
		}

		return removed;
	}

	/**
	 * Copies `[start, end)` over the elements starting at `target`. The length
	 * never changes and overlapping ranges copy from a snapshot of the source.
	 */
	copyWithin(target: number, start: number, end?: number): this {
		const adm = this.adm;
		const length = adm.source.length;
		const range = resolveCopyWithin(length, target, start, end);
		const count = Math.min(range.end - range.start, length - range.target);

		if (count <= 0) {
			return this;
		}

		const snapshot = adm.source.slice(range.start, range.start + count);
		for (let i = 0; i < count; i++) {
			adm.source[range.target + i] = snapshot[i];
		}

		adm.onChanged(false, range.target, count);
		return this;
	}

	fill(value: T, start?: number, end?: number): this {
		const adm = this.adm;
		const [from, to] = resolveRange(adm.source.length, start, end);

		for (let index = from; index < to; index++) {
			adm.source[index] = value;
		}

		if (from < to) {
			adm.onChanged(false, from, to - from);
		}

		return this;
	}

	// ---------------------------------------------------------------------
	// Traversal

	/**
	 * Visits each index once, ascending (or descending for `reduceRight`),
	 * with the length fixed at the start. `visit` returning `false` stops the
	 * walk.
	 */
	private traverse(
		method: string,
		visit: (value: T, index: number) => boolean | void,
		descending = false
	): void {
		const adm = this.adm;
		adm.reportObserved();

		const length = adm.source.length;
		const version = adm.version;
		let warned = false;

		for (let step = 0; step < length; step++) {
			const index = descending ? length - 1 - step : step;
			const proceed = visit(adm.source[index], index);

			if (!warned && adm.version !== version) {
				warned = true;
				reportMutationDuringTraversal(method, length);
			}

			if (proceed === false) {
				return;
			}
		}
	}

	every(predicate: Predicate<T>): boolean {
		let result = true;
		this.traverse("every", (value, index) => {
			if (!predicate(value, index, this)) {
				result = false;
				return false;
			}
		});
		return result;
	}

	some(predicate: Predicate<T>): boolean {
		let result = false;
		this.traverse("some", (value, index) => {
			if (predicate(value, index, this)) {
				result = true;
				return false;
			}
		});
		return result;
	}

	filter(predicate: Predicate<T>): OrderedCollection<T> {
		const matches: T[] = [];
		this.traverse("filter", (value, index) => {
			if (predicate(value, index, this)) {
				matches.push(value);
			}
		});
		return this.derive(matches);
	}

	findAll(predicate: Predicate<T>): OrderedCollection<T> {
		return this.filter(predicate);
	}

	find(predicate: Predicate<T>): T | undefined {
		let result: T | undefined;
		this.traverse("find", (value, index) => {
			if (predicate(value, index, this)) {
				result = value;
				return false;
			}
		});
		return result;
	}

	findIndex(predicate: Predicate<T>): number {
		let result = -1;
		this.traverse("findIndex", (value, index) => {
			if (predicate(value, index, this)) {
				result = index;
				return false;
			}
		});
		return result;
	}

	/**
	 * The last element satisfying `predicate`. Every element is tested, in
	 * ascending order, and the latest match wins.
	 */
	findLast(predicate: Predicate<T>): T | undefined {
		let result: T | undefined;
		this.traverse("findLast", (value, index) => {
			if (predicate(value, index, this)) {
				result = value;
			}
		});
		return result;
	}

	findLastIndex(predicate: Predicate<T>): number {
		let result = -1;
		this.traverse("findLastIndex", (value, index) => {
			if (predicate(value, index, this)) {
				result = index;
			}
		});
		return result;
	}

	forEach(callback: Visitor<T>): void {
		this.traverse("forEach", (value, index) => {
			callback(value, index, this);
		});
	}

	map<U>(callback: Mapper<T, U>): OrderedCollection<U> {
		const mapped: U[] = [];
		this.traverse("map", (value, index) => {
			mapped.push(callback(value, index, this));
		});
		return new OrderedCollection(mapped);
	}

	/**
	 * Left fold. Without `initialValue` the accumulator starts as `undefined`
	 * and an empty collection yields `undefined`.
	 */
	reduce<U>(callback: Reducer<T, U>, initialValue: U): U;
	reduce<U>(callback: Reducer<T, U | undefined>): U | undefined;
	reduce<U>(
		callback: Reducer<T, U | undefined>,
		initialValue?: U
	): U | undefined {
		let accumulator = initialValue;
		this.traverse("reduce", (value, index) => {
			accumulator = callback(accumulator, value, index, this);
		});
		return accumulator;
	}

	reduceRight<U>(callback: Reducer<T, U>, initialValue: U): U;
	reduceRight<U>(callback: Reducer<T, U | undefined>): U | undefined;
	reduceRight<U>(
		callback: Reducer<T, U | undefined>,
		initialValue?: U
	): U | undefined {
		let accumulator = initialValue;
		this.traverse(
			"reduceRight",
			(value, index) => {
				accumulator = callback(accumulator, value, index, this);
			},
			true
		);
		return accumulator;
	}

	/**
	 * Keeps only the elements for which `predicate` is false. Returns how many
	 * were removed.
	 */
	removeAll(predicate: Predicate<T>): number {
		const kept: T[] = [];
		this.traverse("removeAll", (value, index) => {
			if (!predicate(value, index, this)) {
				kept.push(value);
			}
		});

		const adm = this.adm;
		const removed = adm.source.length - kept.length;
		if (removed > 0) {
			adm.source.length = 0;
			for (const value of kept) {
				adm.source.push(value);
			}
			adm.onChanged(true);
		}

		return removed;
	}

	// ---------------------------------------------------------------------
	// Search

	private elementsEqual(a: T, b: T): boolean {
		return (this.options.equals ?? defaultEquals)(a, b);
	}

	indexOf(searchElement: T, fromIndex: number = 0): number {
		const adm = this.adm;
		adm.reportObserved();

		const length = adm.source.length;
		for (let index = relativeIndex(fromIndex, length); index < length; index++) {
			if (this.elementsEqual(adm.source[index], searchElement)) {
				return index;
			}
		}

		return -1;
	}

	/**
	 * Searches backwards from `fromIndex`, which defaults to the last index.
	 */
	lastIndexOf(searchElement: T, fromIndex?: number): number {
		const adm = this.adm;
		adm.reportObserved();

		const length = adm.source.length;
		let index = length - 1;
		if (fromIndex !== undefined) {
			const relative = toInteger(fromIndex);
			index = relative < 0 ? length + relative : Math.min(relative, length - 1);
		}

		for (; index >= 0; index--) {
			if (this.elementsEqual(adm.source[index], searchElement)) {
				return index;
			}
		}

		return -1;
	}

	includes(searchElement: T, fromIndex: number = 0): boolean {
		return this.indexOf(searchElement, fromIndex) !== -1;
	}

	// ---------------------------------------------------------------------
	// Ordering

	/**
	 * Stable, in-place sort. Without a comparator the collection's `compare`
	 * option is used, falling back to the natural ordering of the elements.
	 */
	sort(comparator?: Comparator<T>): this {
		const adm = this.adm;
		const compare = comparator ?? this.options.compare ?? naturalCompare;

		adm.source.sort(compare);
		adm.onChanged(false);
		return this;
	}

	/**
	 * A reversed copy. The receiver is left as it is.
	 */
	reverse(): OrderedCollection<T> {
		const adm = this.adm;
		adm.reportObserved();

		return this.derive(adm.source.slice().reverse());
	}

	concat(...items: Array<T | OrderedCollection<T>>): OrderedCollection<T> {
		const adm = this.adm;
		adm.reportObserved();

		const combined = adm.source.slice();
		for (const item of items) {
			if (item instanceof OrderedCollection) {
				for (const value of item.values()) {
					combined.push(value);
				}
			} else {
				combined.push(item);
			}
		}

		return this.derive(combined);
	}

	// ---------------------------------------------------------------------
	// Conversion

	join(separator: string = ","): string {
		const adm = this.adm;
		adm.reportObserved();

		return adm.source.map(toDisplayString).join(separator);
	}

	keys(): number[] {
		const adm = this.adm;
		adm.reportLengthObserved();

		return Array.from({ length: adm.source.length }, (_, index) => index);
	}

	values(): T[] {
		const adm = this.adm;
		adm.reportObserved();

		return adm.source.slice();
	}

	entries(): Array<[number, T]> {
		return this.values().map((value, index): [number, T] => [index, value]);
	}

	toArray(): T[] {
		return this.values();
	}

	toJSON(): T[] {
		return this.values();
	}

	toString(): string {
		return this.join();
	}

	toLocaleString(): string {
		const adm = this.adm;
		adm.reportObserved();

		return adm.source.map(toLocaleDisplayString).join(",");
	}

	[Symbol.iterator](): Iterator<T> {
		return this.values()[Symbol.iterator]();
	}
}
