import path from "node:path";
import {
	makeTempDir,
	removeDir,
	writeEmpty,
	writeGarbage,
	writeJpeg,
	writeTruncatedJpeg,
} from "../../testing/images";
import { openImage, readImageInfo, resolveDpi } from "../metadata";

describe("resolveDpi", () => {
	it("rounds to whole dots per inch", () => {
		expect(resolveDpi(299.6)).toBe(300);
		expect(resolveDpi(72)).toBe(72);
	});

	it("falls back to 72 when missing or unusable", () => {
		expect(resolveDpi(undefined)).toBe(72);
		expect(resolveDpi(Number.NaN)).toBe(72);
		expect(resolveDpi(0)).toBe(72);
	});
});

describe("readImageInfo", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await makeTempDir();
	});

	afterEach(async () => {
		await removeDir(dir);
	});

	it("reads size and density", async () => {
		const file = await writeJpeg(path.join(dir, "wide.jpg"), {
			width: 400,
			height: 300,
			density: 300,
		});

		const result = await readImageInfo(file);

		expect(result).toEqual({
			_tag: "Right",
			right: { width: 400, height: 300, dpi: 300 },
		});
	});

	it("reports display size for a rotated camera image", async () => {
		// stored 300x200, tagged "rotate 90° clockwise to display"
		const file = await writeJpeg(path.join(dir, "rotated.jpg"), {
			width: 300,
			height: 200,
			density: 72,
			orientation: 6,
		});

		const result = await readImageInfo(file);

		expect(result).toEqual({
			_tag: "Right",
			right: { width: 200, height: 300, dpi: 72 },
		});
	});

	it("keeps the stored axes for a 180° orientation", async () => {
		const file = await writeJpeg(path.join(dir, "upside-down.jpg"), {
			width: 300,
			height: 200,
			density: 72,
			orientation: 3,
		});

		const result = await readImageInfo(file);

		expect(result._tag === "Right" && result.right.width).toBe(300);
	});

	it("fails with DecodeError for a file that is not an image", async () => {
		const file = await writeGarbage(path.join(dir, "broken.jpg"));

		const result = await readImageInfo(file);

		expect(result._tag).toBe("Left");
		if (result._tag === "Left") {
			expect(result.left._tag).toBe("DecodeError");
			expect(result.left.message).toContain(file);
		}
	});

	it("fails with DecodeError for an empty file", async () => {
		const file = await writeEmpty(path.join(dir, "empty.jpg"));

		const result = await readImageInfo(file);

		expect(result._tag === "Left" && result.left._tag).toBe("DecodeError");
	});

	it("fails with DecodeError when the pixel data is cut off", async () => {
		const file = await writeTruncatedJpeg(path.join(dir, "cut.jpg"));

		const result = await readImageInfo(file);

		expect(result._tag === "Left" && result.left._tag).toBe("DecodeError");
	});

	it("fails with DecodeError for a file that does not exist", async () => {
		const result = await openImage(path.join(dir, "missing.jpg"));

		expect(result._tag === "Left" && result.left._tag).toBe("DecodeError");
	});
});
