import * as fs from "fs";
import * as path from "path";
import { compareText, escapeMarkup } from "../core/utils";

export interface GalleryResult {
  galleryPath: string;
  images: string[];
}

const STYLE = `body {
    font-family: Arial, sans-serif;
    background-color: #f4f4f4;
    margin: 0;
    padding: 20px;
}
.container {
    max-width: 800px;
    margin: 0 auto;
}
h2 {
    color: #333;
}
img {
    display: block;
    margin: 10px auto;
    box-shadow: 0px 0px 5px 0px rgba(0,0,0,0.75);
}`;

/** PNG file names directly inside `imageDir`, sorted. Subdirectories are ignored. */
export function listPngFiles(imageDir: string): string[] {
  return fs
    .readdirSync(imageDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === ".png")
    .map((entry) => entry.name)
    .sort(compareText);
}

/**
 * Render the gallery document.
 * @param images - File names, in display order
 * @param srcPrefix - Path from the gallery file to the image directory, "/"-separated
 */
export function renderGalleryHtml(images: string[], srcPrefix: string): string {
  const entries = images
    .map((file) => {
      const src = srcPrefix ? `${srcPrefix}/${file}` : file;
      return [
        `<h2>${escapeMarkup(file)}</h2>`,
        `<img src="${escapeMarkup(src)}" alt="${escapeMarkup(file)}" width="800">`,
        "<br>",
      ].join("\n");
    })
    .join("\n");

  return [
    "<!DOCTYPE html>",
    "<html>",
    "<head>",
    '<meta charset="utf-8">',
    "<title>Plot Gallery</title>",
    "<style>",
    STYLE,
    "</style>",
    "</head>",
    "<body>",
    '<div class="container">',
    ...(entries ? [entries] : []),
    "</div>",
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

/**
 * Write an HTML page listing every PNG in `imageDir`.
 * Image paths are relative to the gallery file's own directory.
 */
export function buildGallery(imageDir: string, galleryPath: string): GalleryResult {
  const images = listPngFiles(imageDir);
  const srcPrefix = path
    .relative(path.dirname(galleryPath), imageDir)
    .split(path.sep)
    .join("/");

  fs.mkdirSync(path.dirname(galleryPath), { recursive: true });
  fs.writeFileSync(galleryPath, renderGalleryHtml(images, srcPrefix), "utf-8");

  return { galleryPath, images };
}
