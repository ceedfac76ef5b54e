import type { Configuration } from "./types";

const configuration: Configuration = {
	warnOnMutationDuringTraversal: process.env.NODE_ENV !== "production",
};

export function configure(options: Partial<Configuration>): void {
	if (options.warnOnMutationDuringTraversal !== undefined) {
		configuration.warnOnMutationDuringTraversal =
			options.warnOnMutationDuringTraversal;
	}
}

export function getConfiguration(): Readonly<Configuration> {
	return configuration;
}

export function reportMutationDuringTraversal(
	method: string,
	length: number
): void {
	if (configuration.warnOnMutationDuringTraversal) {
		console.warn(
			`ordered-collection: the collection was mutated from inside a ${method}() callback. ` +
				`Iteration bounds were fixed at ${length} element(s) when the call started; ` +
				`results of mutating a collection while traversing it are not guaranteed.`
		);
	}
}
