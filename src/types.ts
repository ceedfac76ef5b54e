import type { OrderedCollection } from "./collection/OrderedCollection";

/** Elements that define their own equality for searches. */
export interface Equatable {
	equals(other: unknown): boolean;
}

/** Elements that define their own natural ordering for `sort()`. */
export interface Comparable {
	compareTo(other: unknown): number;
}

export type CollectionOptions<T> = {
	equals?: (a: T, b: T) => boolean;
	compare?: Comparator<T>;
};

export type Comparator<T> = (a: T, b: T) => number;

export type Predicate<T> = (
	value: T,
	index: number,
	collection: OrderedCollection<T>
) => boolean;

export type Visitor<T> = (
	value: T,
	index: number,
	collection: OrderedCollection<T>
) => void;

export type Mapper<T, U> = (
	value: T,
	index: number,
	collection: OrderedCollection<T>
) => U;

export type Reducer<T, U> = (
	accumulator: U,
	value: T,
	index: number,
	collection: OrderedCollection<T>
) => U;

export type Configuration = {
	/** Log a warning when a callback mutates the collection it traverses. */
	warnOnMutationDuringTraversal: boolean;
};
