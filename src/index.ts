export { OrderedCollection } from "./collection/OrderedCollection";
export {
	dynamicCollection,
	type DynamicCollection,
} from "./collection/DynamicCollection";
export { IndexOutOfRangeError } from "./errors";
export { configure, getConfiguration } from "./config";

export {
	reaction,
	batch,
	computed,
	effect,
	untracked,
	type ReadonlySignal,
} from "./observables";

export type {
	CollectionOptions,
	Comparable,
	Comparator,
	Configuration,
	Equatable,
	Mapper,
	Predicate,
	Reducer,
	Visitor,
} from "./types";
