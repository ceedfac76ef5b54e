export class IndexOutOfRangeError extends RangeError {
	readonly index: number;
	readonly length: number;

	constructor(index: number, length: number) {
		super(
			`ordered-collection: index ${index} is out of range for a collection of length ${length}.`
		);
		this.name = "IndexOutOfRangeError";
		this.index = index;
		this.length = length;
	}
}
