import { OrderedCollection } from "../src";

const collection = <T>(items: T[] = []): OrderedCollection<T> =>
	OrderedCollection.from(items);

describe("slice", () => {
	test("full slice is an equal, independent collection", () => {
		const c = collection(["a", "b", "c", "d"]);
		const copy = c.slice(0, c.length);

		expect(copy).not.toBe(c);
		expect(copy.toArray()).toEqual(c.toArray());

		copy.set(0, "z");
		copy.push("e");
		expect(c.toArray()).toEqual(["a", "b", "c", "d"]);
	});

	test("negative start counts from the end", () => {
		expect(collection(["a", "b", "c", "d"]).slice(-2).toArray()).toEqual([
			"c",
			"d",
		]);
	});

	test("negative end counts from the end", () => {
		expect(collection(["a", "b", "c", "d"]).slice(1, -1).toArray()).toEqual([
			"b",
			"c",
		]);
	});

	test("out-of-range bounds are clamped", () => {
		const c = collection([1, 2, 3]);
		expect(c.slice(-10, 10).toArray()).toEqual([1, 2, 3]);
		expect(c.slice(5).toArray()).toEqual([]);
		expect(c.slice(2, 1).toArray()).toEqual([]);
	});

	test("fractional and NaN bounds are truncated", () => {
		const c = collection(["a", "b", "c", "d"]);
		expect(c.slice(2.7).toArray()).toEqual(["c", "d"]);
		expect(c.slice(Number.NaN, 1).toArray()).toEqual(["a"]);
		expect(c.slice(0, Number.POSITIVE_INFINITY).length).toBe(4);
	});
});

describe("splice", () => {
	test("returns exactly the removed region", () => {
		const c = collection(["a", "b", "c", "d"]);
		const removed = c.splice(1, 2);

		expect(removed.toArray()).toEqual(["b", "c"]);
		expect(c.toArray()).toEqual(["a", "d"]);
	});

	test("delete count defaults to zero", () => {
		const c = collection(["a", "b"]);
		expect(c.splice(1).toArray()).toEqual([]);
		expect(c.toArray()).toEqual(["a", "b"]);
	});

	test("replaces the removed region with the new items", () => {
		const c = collection(["a", "b", "c", "d"]);
		const removed = c.splice(1, 1, "x", "y");

		expect(removed.toArray()).toEqual(["b"]);
		expect(c.toArray()).toEqual(["a", "x", "y", "c", "d"]);
	});

	test("negative start counts from the end", () => {
		const c = collection(["a", "b", "c", "d"]);
		expect(c.splice(-2, 1).toArray()).toEqual(["c"]);
		expect(c.toArray()).toEqual(["a", "b", "d"]);
	});

	test("clamps start and delete count", () => {
		const a = collection([1, 2, 3]);
		expect(a.splice(-10, 5, 4, 5, 6).toArray()).toEqual([1, 2, 3]);
		expect(a.toArray()).toEqual([4, 5, 6]);

		const b = collection(["a", "b"]);
		expect(b.splice(10, 1, "z").toArray()).toEqual([]);
		expect(b.toArray()).toEqual(["a", "b", "z"]);

		const c = collection(["a", "b"]);
		expect(c.splice(1, -3).toArray()).toEqual([]);
		expect(c.toArray()).toEqual(["a", "b"]);
	});

	test("insertion longer than the deletion shifts the tail once", () => {
		const c = collection([1, 2, 3, 4, 5]);
		const removed = c.splice(1, 2, 7, 8, 9, 10);

		expect(removed.toArray()).toEqual([2, 3]);
		expect(c.toArray()).toEqual([1, 7, 8, 9, 10, 4, 5]);
	});

	test("the removed collection is independent", () => {
		const c = collection([1, 2, 3]);
		const removed = c.splice(0, 2);
		removed.push(99);

		expect(c.toArray()).toEqual([3]);
		expect(removed.toArray()).toEqual([1, 2, 99]);
	});
});

describe("fill", () => {
	test("fills the half-open range", () => {
		const c = collection(["a", "b", "c", "d"]);
		expect(c.fill("v", 1, 3).toArray()).toEqual(["a", "v", "v", "d"]);
	});

	test("returns the receiver", () => {
		const c = collection([1, 2]);
		expect(c.fill(0)).toBe(c);
		expect(c.toArray()).toEqual([0, 0]);
	});

	test("negative and out-of-range bounds", () => {
		expect(collection(["a", "b", "c", "d"]).fill("x", -2).toArray()).toEqual([
			"a",
			"b",
			"x",
			"x",
		]);
		expect(collection([1, 2, 3]).fill(0, -10, 10).toArray()).toEqual([
			0, 0, 0,
		]);
		expect(collection([1, 2, 3]).fill(0, 2, 1).toArray()).toEqual([1, 2, 3]);
		expect(collection([1, 2, 3]).fill(0, 1, -1).toArray()).toEqual([1, 0, 3]);
	});

	test("writes the same reference into every slot", () => {
		const marker = { id: 1 };
		const c = collection<object>([{}, {}, {}]).fill(marker);

		expect(c.get(0)).toBe(marker);
		expect(c.get(2)).toBe(marker);
	});
});

describe("copyWithin", () => {
	test("copies a region over the start", () => {
		const c = collection(["a", "b", "c", "d"]);
		expect(c.copyWithin(0, 2, 4).toArray()).toEqual(["c", "d", "c", "d"]);
	});

	test("never changes the length", () => {
		const c = collection([1, 2, 3, 4, 5]);
		c.copyWithin(3, 0);
		expect(c.length).toBe(5);
		expect(c.toArray()).toEqual([1, 2, 3, 1, 2]);
	});

	test("forward overlap reads from a snapshot", () => {
		const c = collection([1, 2, 3, 4, 5]);
		expect(c.copyWithin(1, 0).toArray()).toEqual([1, 1, 2, 3, 4]);
	});

	test("backward overlap", () => {
		const c = collection([1, 2, 3, 4, 5]);
		expect(c.copyWithin(0, 1).toArray()).toEqual([2, 3, 4, 5, 5]);
	});

	test("negative target", () => {
		const c = collection([1, 2, 3, 4, 5]);
		expect(c.copyWithin(-2, 0).toArray()).toEqual([1, 2, 3, 1, 2]);
	});

	test("negative start with the default end", () => {
		const c = collection([1, 2, 3, 4, 5]);
		expect(c.copyWithin(0, -2).toArray()).toEqual([4, 5, 3, 4, 5]);
	});

	test("negative end with a positive start", () => {
		const c = collection([1, 2, 3, 4, 5]);
		expect(c.copyWithin(0, 1, -1).toArray()).toEqual([2, 3, 4, 4, 5]);
	});

	test("a negative start resolves to the end when the end is negative too", () => {
		// start takes the resolved end (4), leaving an empty source region
		const c = collection([1, 2, 3, 4, 5]);
		expect(c.copyWithin(0, -2, -1).toArray()).toEqual([1, 2, 3, 4, 5]);
	});

	test("returns the receiver", () => {
		const c = collection([1, 2]);
		expect(c.copyWithin(0, 1)).toBe(c);
		expect(c.copyWithin(5, 0)).toBe(c);
		expect(c.toArray()).toEqual([2, 2]);
	});
});
