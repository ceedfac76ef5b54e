import { OrderedCollection } from "./OrderedCollection";

/**
 * A collection of heterogeneous values: the generic collection instantiated
 * at `unknown`.
 */
export type DynamicCollection = OrderedCollection<unknown>;

export function dynamicCollection(...items: unknown[]): DynamicCollection {
	return new OrderedCollection<unknown>(items);
}

