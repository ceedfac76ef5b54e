export { Administration } from "./internal/Administration";
export {
	type AtomNode,
	type ObservedAtomNode,
	reaction,
	batch,
	computed,
	effect,
	untracked,
	type ReadonlySignal,
} from "./preact";
