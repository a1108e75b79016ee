import fs from "node:fs/promises";
import path from "node:path";
import sharp from "sharp";
import {
	makeTempDir,
	recordingLogger,
	removeDir,
	writeGarbage,
	writeJpeg,
} from "../../testing/images";
import type { GalleryConfig } from "../../types";
import { runGallery } from "../run";

function configFor(root: string, overrides: Partial<GalleryConfig> = {}): GalleryConfig {
	return {
		inputFolder: root,
		outputFolder: path.join(root, "gallery"),
		thumbWidth: 600,
		extensions: [".jpg", ".jpeg"],
		skipExisting: false,
		html: false,
		voteBox: false,
		logLevel: "info",
		progress: false,
		...overrides,
	};
}

describe("runGallery", () => {
	let root: string;

	beforeEach(async () => {
		root = await makeTempDir();
	});

	afterEach(async () => {
		await removeDir(root);
	});

	it("reports statistics, writes thumbnails and the vote sheet", async () => {
		await writeJpeg(path.join(root, "A", "landscape.jpg"), {
			width: 4000,
			height: 3000,
			density: 300,
		});
		await writeJpeg(path.join(root, "B", "portrait.jpg"), {
			width: 3000,
			height: 4000,
			density: 72,
		});
		const printed: string[] = [];

		const summary = await runGallery(configFor(root, { html: true }), {
			print: (line) => printed.push(line),
		});

		expect(printed).toEqual([
			"Landscape High DPI (>250): 1",
			"Landscape Low DPI (<250): 0",
			"Landscape Other DPI (=250): 0",
			"Portrait High DPI (>250): 0",
			"Portrait Low DPI (<250): 1",
			"Portrait Other DPI (=250): 0",
			"Thumbnails created: 2",
		]);
		const out = path.join(root, "gallery");
		expect(summary.htmlPath).toBe(path.join(out, "ImageGallery.html"));
		expect((await fs.readdir(out)).sort()).toEqual([
			"001-A-landscape-4000x3000@300.jpg",
			"002-B-portrait-3000x4000@72.jpg",
			"ImageGallery.html",
		]);

		const thumb = await sharp(
			path.join(out, "002-B-portrait-3000x4000@72.jpg"),
		).metadata();
		expect([thumb.width, thumb.height]).toEqual([600, 800]);

		const html = await fs.readFile(path.join(out, "ImageGallery.html"), "utf-8");
		expect(html).toContain('<div class="meta">Image nr # 001</div>');
		expect(html).toContain('<div class="meta">Image nr # 002</div>');
	});

	it("keeps going past a corrupt file with one warning", async () => {
		await writeJpeg(path.join(root, "a.jpg"), { width: 40, height: 30 });
		await writeGarbage(path.join(root, "b.jpg"));
		await writeJpeg(path.join(root, "c.jpg"), { width: 30, height: 40 });
		const logger = recordingLogger();

		const summary = await runGallery(configFor(root, { thumbWidth: 20 }), {
			logger,
			print: () => undefined,
		});

		expect(summary.unreadable).toBe(1);
		expect(summary.batch.created).toBe(2);
		expect(summary.batch.failed).toBe(1);
		// one from the statistics pass, one from the thumbnail pass
		expect(logger.lines.warn).toHaveLength(2);
		expect(logger.lines.warn[1]).toContain("Failed processing image");
	});

	it("fails before any image work when the output folder cannot be created", async () => {
		await writeJpeg(path.join(root, "a.jpg"), { width: 40, height: 30 });
		const blocker = path.join(root, "blocker");
		await fs.writeFile(blocker, "a file, not a folder");

		await expect(
			runGallery(configFor(root, { outputFolder: path.join(blocker, "out") }), {
				print: () => undefined,
			}),
		).rejects.toMatchObject({
			_tag: "FilesystemError",
			path: path.join(blocker, "out"),
		});
	});

	it("fails when the input folder does not exist", async () => {
		const missing = path.join(root, "missing");

		await expect(
			runGallery(configFor(missing), { print: () => undefined }),
		).rejects.toMatchObject({ _tag: "FilesystemError", path: missing });
	});
});
