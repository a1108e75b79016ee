import fs from "node:fs/promises";
import path from "node:path";
import { describeError, errorCode, FilesystemError } from "../errors";
import { type Logger, silentLogger } from "../logger";
import { getFilesInFolder } from "../utils";

export const GALLERY_FILENAME = "ImageGallery.html";
const CARDS_PER_PAGE = 4;

const CSS = `
    :root { --gap: 16px; --border: 1px solid #ddd; --radius: 12px; }
    body { font-family: Arial, sans-serif; margin: 16px; }
    h1 { margin: 0 0 16px 0; }

    .gallery {
        display: grid;
        grid-template-columns: repeat(2, 1fr);
        gap: var(--gap);
        align-items: start;
    }

    .card {
        border: var(--border);
        border-radius: var(--radius);
        padding: 12px;
    }

    .card img {
        width: 100%;
        height: auto;
        display: block;
        border-radius: 10px;
    }

    .meta {
        margin: 10px 0 8px 0;
        font-size: 14px;
    }

    .vote {
        border: 2px dashed #333;
        border-radius: 10px;
        height: 90px;
        display: flex;
        align-items: center;
        justify-content: center;
        font-weight: 700;
        letter-spacing: 1px;
        user-select: none;
    }

    @media print {
        body { margin: 10mm; }
        .gallery { gap: 10mm; }
        .card { break-inside: avoid; page-break-inside: avoid; }
        .page-break { break-after: page; page-break-after: always; }
    }
`;

const HTML_ESCAPES: Record<string, string> = {
	"&": "&amp;",
	"<": "&lt;",
	">": "&gt;",
	'"': "&quot;",
	"'": "&#39;",
};

export function escapeHtml(text: string): string {
	return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** Text before the first hyphen (the serial), else the 1-based position. */
export function displayNumber(name: string, position: number): string {
	const hyphen = name.indexOf("-");
	return hyphen === -1 ? String(position) : name.slice(0, hyphen);
}

function renderCard(name: string, position: number, voteBox: boolean): string {
	const pageBreak = position % CARDS_PER_PAGE === 0 ? " page-break" : "";
	const label = escapeHtml(name);
	const vote = voteBox ? "<div class='vote'>VOTE HERE</div>" : "";
	return `
        <div class="card${pageBreak}">
            <img src="./${escapeHtml(encodeURIComponent(name))}" alt="${label}" title="${label}">
            <div class="meta">Image nr # ${escapeHtml(displayNumber(name, position))}</div>
            ${vote}
        </div>`;
}

/**
 * Printable vote sheet: one card per image in the given order, with a page
 * break after every fourth card. Pure; the same input gives the same bytes.
 */
export function renderGalleryHtml(names: ReadonlyArray<string>, voteBox: boolean): string {
	const cards = names.map((name, i) => renderCard(name, i + 1, voteBox)).join("");
	return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>Photo Vote Sheet</title>
    <style>${CSS}</style>
</head>
<body>
<h1>Photo Vote Sheet</h1>
<div class="gallery">${cards}
</div>
</body>
</html>
`;
}

/**
 * Writes `ImageGallery.html` into `outputFolder`, listing the JPEGs that are
 * there now (not only the ones this run created).
 */
export async function generateHtmlGallery(
	outputFolder: string,
	voteBox: boolean,
	logger: Logger = silentLogger,
): Promise<string> {
	const files = await getFilesInFolder(outputFolder, ["jpg", "jpeg"]);
	const names = files.map((f) => path.basename(f));
	const outFile = path.join(outputFolder, GALLERY_FILENAME);

	try {
		await fs.writeFile(outFile, renderGalleryHtml(names, voteBox), "utf-8");
	} catch (err) {
		throw new FilesystemError(outFile, describeError(err), errorCode(err));
	}
	logger.info(`HTML gallery written: ${outFile}`);
	return outFile;
}
