/**
 * Cover generation from article thumbnails
 *
 * With thumbnails available the cover is a two-column mosaic: every image is
 * scaled to cover its cell and centre-cropped, so cells never show
 * letterboxing. A translucent band at the bottom carries the title and a
 * creation line. Without thumbnails a plain text cover is drawn instead.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import sharp from "sharp";
import { HttpSession } from "./http.js";
import { silentLogger, type Logger } from "./logger.js";
import { createTextRenderer, type RenderedText, type TextRenderer } from "./text.js";
import type { Article, Closeable } from "./types.js";
import { getErrorMessage } from "./utils.js";

/** Name shown in the cover's creation line */
export const TOOL_NAME = "skybook";

/** Geometry and styling of the cover */
export interface CoverLayout {
  width: number;
  height: number;
  columns: number;
  /** Height of the title band at the bottom of the mosaic */
  bandHeight: number;
  /** Maximum number of thumbnails placed in the mosaic */
  maxImages: number;
  mosaicBackground: string;
  simpleBackground: string;
  /** Band colour as RGB plus alpha in 0..255 */
  band: { r: number; g: number; b: number; alpha: number };
  jpegQuality: number;
  /** Horizontal space kept free on both sides of the text */
  textMargin: number;
  mosaicText: CoverTextStyle;
  simpleText: CoverTextStyle;
}

export interface CoverTextStyle {
  titleSize: number;
  subtitleSize: number;
  /** Vertical gap between title and subtitle */
  spacing: number;
  titleColor: string;
  subtitleColor: string;
}

/** E-reader resolution (portrait 3:4) */
export const DEFAULT_COVER_LAYOUT: CoverLayout = {
  width: 1264,
  height: 1680,
  columns: 2,
  bandHeight: 200,
  maxImages: 20,
  mosaicBackground: "#1a1a1a",
  simpleBackground: "#2C3E50",
  band: { r: 0, g: 0, b: 0, alpha: 180 },
  jpegQuality: 95,
  textMargin: 40,
  mosaicText: { titleSize: 60, subtitleSize: 24, spacing: 10, titleColor: "#ffffff", subtitleColor: "#c8c8c8" },
  simpleText: { titleSize: 80, subtitleSize: 30, spacing: 20, titleColor: "#ffffff", subtitleColor: "#cccccc" },
};

/** Position and size of one mosaic cell */
export interface Cell {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface MosaicPlan {
  columns: number;
  rows: number;
  cellWidth: number;
  cellHeight: number;
  /** One cell per image, row by row */
  cells: Cell[];
}

/** Scaled size of an image and the crop offset that centres it in a target */
export interface FillGeometry {
  width: number;
  height: number;
  left: number;
  top: number;
}

/** A decoded image kept as raw pixels */
export interface DecodedImage {
  data: Buffer;
  width: number;
  height: number;
  channels: sharp.Raw["channels"];
}

/** Downloads image bytes for a URL; rejects on failure */
export type ImageFetcher = (url: string) => Promise<Buffer>;

export interface CoverOptions {
  /** Title drawn on the cover */
  title: string;
  /** Also write the JPEG to this path */
  outputPath?: string;
}

/**
 * Ordinal suffix for a day of the month.
 *
 * @example
 * getOrdinalSuffix(1) // 'st'
 * getOrdinalSuffix(12) // 'th'
 * getOrdinalSuffix(23) // 'rd'
 */
export function getOrdinalSuffix(day: number): string {
  if (day % 100 >= 10 && day % 100 <= 20) return "th";
  switch (day % 10) {
    case 1:
      return "st";
    case 2:
      return "nd";
    case 3:
      return "rd";
    default:
      return "th";
  }
}

/**
 * Format a date for the cover's creation line.
 *
 * @example
 * formatCreationDate(new Date(2025, 9, 26)) // 'Sunday, 26th of October 2025'
 */
export function formatCreationDate(date: Date): string {
  const weekday = date.toLocaleDateString("en-US", { weekday: "long" });
  const month = date.toLocaleDateString("en-US", { month: "long" });
  const day = date.getDate();
  return `${weekday}, ${day}${getOrdinalSuffix(day)} of ${month} ${date.getFullYear()}`;
}

export function creationLine(date: Date): string {
  return `Created on ${formatCreationDate(date)}, by ${TOOL_NAME}`;
}

/**
 * Lay out a grid for a number of images above the title band.
 */
export function planMosaic(count: number, layout: CoverLayout = DEFAULT_COVER_LAYOUT): MosaicPlan {
  const columns = layout.columns;
  const rows = Math.max(1, Math.ceil(count / columns));
  const cellWidth = Math.floor(layout.width / columns);
  const cellHeight = Math.floor((layout.height - layout.bandHeight) / rows);

  const cells: Cell[] = [];
  for (let i = 0; i < count; i++) {
    cells.push({
      left: (i % columns) * cellWidth,
      top: Math.floor(i / columns) * cellHeight,
      width: cellWidth,
      height: cellHeight,
    });
  }

  return { columns, rows, cellWidth, cellHeight, cells };
}

/**
 * Scale a source so it covers the target, then centre the crop box.
 * The wider of the two ratios decides which side is matched exactly.
 *
 * @example
 * coverFill(400, 100, 100, 100) // { width: 400, height: 100, left: 150, top: 0 }
 */
export function coverFill(sourceWidth: number, sourceHeight: number, targetWidth: number, targetHeight: number): FillGeometry {
  const sourceRatio = sourceWidth / sourceHeight;
  const targetRatio = targetWidth / targetHeight;

  let width: number;
  let height: number;
  if (sourceRatio > targetRatio) {
    // Wider than the cell: match height, crop the sides
    height = targetHeight;
    width = Math.max(targetWidth, Math.floor(targetHeight * sourceRatio));
  } else {
    // Taller than the cell: match width, crop top and bottom
    width = targetWidth;
    height = Math.max(targetHeight, Math.floor(targetWidth / sourceRatio));
  }

  return {
    width,
    height,
    left: Math.floor((width - targetWidth) / 2),
    top: Math.floor((height - targetHeight) / 2),
  };
}

/**
 * Decode image bytes to raw RGB pixels, applying EXIF orientation and
 * flattening transparency onto white.
 *
 * @throws {Error} If the bytes are not a decodable image
 */
export async function decodeImage(buffer: Buffer): Promise<DecodedImage> {
  const { data, info } = await sharp(buffer)
    .rotate()
    .flatten({ background: { r: 255, g: 255, b: 255 } })
    .raw()
    .toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height, channels: info.channels };
}

/**
 * Scale an image to cover the target size and crop it to exactly that size.
 *
 * @returns PNG of exactly targetWidth x targetHeight pixels
 */
export async function cropToFill(image: DecodedImage, targetWidth: number, targetHeight: number): Promise<Buffer> {
  const fill = coverFill(image.width, image.height, targetWidth, targetHeight);
  return await sharp(image.data, { raw: { width: image.width, height: image.height, channels: image.channels } })
    .resize(fill.width, fill.height, { fit: "fill", kernel: "lanczos3" })
    .extract({ left: fill.left, top: fill.top, width: targetWidth, height: targetHeight })
    .png()
    .toBuffer();
}

function centeredLeft(canvasWidth: number, text: RenderedText): number {
  return Math.max(0, Math.floor((canvasWidth - text.width) / 2));
}

/**
 * Composite inputs for a title and subtitle stacked from startY, each
 * centred horizontally by its measured width.
 */
function stackedText(
  canvasWidth: number,
  startY: number,
  spacing: number,
  title: RenderedText | null,
  subtitle: RenderedText | null,
): sharp.OverlayOptions[] {
  const overlays: sharp.OverlayOptions[] = [];
  if (title) {
    overlays.push({ input: title.data, left: centeredLeft(canvasWidth, title), top: startY });
  }
  if (subtitle) {
    const top = title ? startY + title.height + spacing : startY;
    overlays.push({ input: subtitle.data, left: centeredLeft(canvasWidth, subtitle), top });
  }
  return overlays;
}

function stackHeight(spacing: number, title: RenderedText | null, subtitle: RenderedText | null): number {
  const gap = title && subtitle ? spacing : 0;
  return (title?.height ?? 0) + gap + (subtitle?.height ?? 0);
}

export class CoverGenerator implements Closeable {
  readonly layout: CoverLayout;
  private readonly session: HttpSession | null;
  private readonly fetchImage: ImageFetcher;
  private readonly textRenderer: TextRenderer;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    options: {
      layout?: CoverLayout;
      /** Image downloader (default: an owned HttpSession) */
      fetchImage?: ImageFetcher;
      textRenderer?: TextRenderer;
      timeoutMs?: number;
      logger?: Logger;
      now?: () => Date;
    } = {},
  ) {
    this.layout = options.layout ?? DEFAULT_COVER_LAYOUT;
    this.logger = options.logger ?? silentLogger;
    this.textRenderer = options.textRenderer ?? createTextRenderer({ logger: this.logger });
    this.now = options.now ?? (() => new Date());

    if (options.fetchImage) {
      this.session = null;
      this.fetchImage = options.fetchImage;
    } else {
      const session = new HttpSession({ timeoutMs: options.timeoutMs });
      this.session = session;
      this.fetchImage = (url) => session.getBuffer(url);
    }
  }

  /**
   * Generate a cover from article thumbnails.
   *
   * @returns Cover as JPEG bytes
   */
  async generateCover(articles: readonly Article[], options: CoverOptions): Promise<Buffer> {
    this.logger.info(`Generating cover from ${articles.length} articles`);

    const thumbnailUrls = articles.flatMap((article) => (article.thumbnailUrl ? [article.thumbnailUrl] : []));
    const images = await this.downloadImages(thumbnailUrls);

    let cover: Buffer;
    if (images.length === 0) {
      this.logger.warn("No thumbnail images available, creating simple cover");
      cover = await this.createSimpleCover(options.title);
    } else {
      cover = await this.createMosaic(images, options.title);
    }

    if (options.outputPath) {
      await fs.mkdir(path.dirname(options.outputPath), { recursive: true });
      await fs.writeFile(options.outputPath, cover);
      this.logger.info(`Saved cover to ${options.outputPath}`);
    }

    return cover;
  }

  /**
   * Download and decode images in turn, up to the layout's image limit.
   * Images that fail to download or decode are skipped.
   */
  async downloadImages(urls: readonly string[]): Promise<DecodedImage[]> {
    const images: DecodedImage[] = [];

    for (const url of urls.slice(0, this.layout.maxImages)) {
      try {
        this.logger.debug(`Downloading image: ${url}`);
        images.push(await decodeImage(await this.fetchImage(url)));
      } catch (error) {
        this.logger.debug(`Failed to download image ${url}: ${getErrorMessage(error)}`);
      }
    }

    this.logger.info(`Successfully downloaded ${images.length} images`);
    return images;
  }

  /**
   * Compose images into the mosaic cover with the title band.
   *
   * @returns Cover as JPEG bytes
   */
  async createMosaic(images: readonly DecodedImage[], title: string): Promise<Buffer> {
    const { width, height, bandHeight, mosaicText } = this.layout;
    const plan = planMosaic(images.length, this.layout);

    const overlays: sharp.OverlayOptions[] = [];
    for (let i = 0; i < images.length; i++) {
      const cell = plan.cells[i];
      overlays.push({ input: await cropToFill(images[i], cell.width, cell.height), left: cell.left, top: cell.top });
    }

    const band = await sharp({
      create: {
        width,
        height: bandHeight,
        channels: 4,
        background: { ...this.layout.band, alpha: this.layout.band.alpha / 255 },
      },
    })
      .png()
      .toBuffer();
    overlays.push({ input: band, left: 0, top: height - bandHeight });

    const [titleText, subtitleText] = await this.renderTitle(title, mosaicText);
    const total = stackHeight(mosaicText.spacing, titleText, subtitleText);
    const startY = height - Math.floor(bandHeight / 2) - Math.floor(total / 2);
    overlays.push(...stackedText(width, startY, mosaicText.spacing, titleText, subtitleText));

    return await this.render(this.layout.mosaicBackground, overlays);
  }

  /**
   * Draw a text-only cover with the title block centred on the page.
   *
   * @returns Cover as JPEG bytes
   */
  async createSimpleCover(title: string): Promise<Buffer> {
    const { width, height, simpleText } = this.layout;

    const [titleText, subtitleText] = await this.renderTitle(title, simpleText);
    const total = stackHeight(simpleText.spacing, titleText, subtitleText);
    const startY = Math.floor((height - total) / 2);

    return await this.render(
      this.layout.simpleBackground,
      stackedText(width, startY, simpleText.spacing, titleText, subtitleText),
    );
  }

  private async renderTitle(title: string, style: CoverTextStyle): Promise<[RenderedText | null, RenderedText | null]> {
    const maxWidth = this.layout.width - 2 * this.layout.textMargin;
    const titleText = await this.textRenderer.render(title, {
      size: style.titleSize,
      bold: true,
      color: style.titleColor,
      maxWidth,
    });
    const subtitleText = await this.textRenderer.render(creationLine(this.now()), {
      size: style.subtitleSize,
      color: style.subtitleColor,
      maxWidth,
    });
    return [titleText, subtitleText];
  }

  private async render(background: string, overlays: sharp.OverlayOptions[]): Promise<Buffer> {
    let canvas = sharp({
      create: { width: this.layout.width, height: this.layout.height, channels: 3, background },
    });
    if (overlays.length > 0) {
      canvas = canvas.composite(overlays);
    }
    return await canvas.jpeg({ quality: this.layout.jpegQuality }).toBuffer();
  }

  close(): void {
    this.session?.close();
  }
}
