/**
 * Text rasterization for cover titles
 *
 * Text is rendered by sharp (libvips/Pango) into a transparent PNG whose size
 * is the measured extent of the text, which the cover layout uses for
 * centering. Fonts are tried in order; the last candidate has no font file
 * and uses Pango's default sans family.
 */

import * as fs from "node:fs/promises";
import sharp from "sharp";
import { silentLogger, type Logger } from "./logger.js";
import { escapeXml, getErrorMessage } from "./utils.js";

/** A font family with optional font files for regular and bold weights */
export interface FontCandidate {
  /** Pango family name (e.g., 'DejaVu Sans') */
  family: string;
  regularFile?: string;
  boldFile?: string;
}

export const FONT_CANDIDATES: readonly FontCandidate[] = [
  {
    family: "DejaVu Sans",
    regularFile: "/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf",
    boldFile: "/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf",
  },
  {
    family: "Helvetica",
    regularFile: "/System/Library/Fonts/Helvetica.ttc",
    boldFile: "/System/Library/Fonts/Helvetica.ttc",
  },
  { family: "sans" },
];

export interface TextStyle {
  /** Font size in pixels */
  size: number;
  bold?: boolean;
  /** CSS hex colour, e.g. '#ffffff' */
  color: string;
  /** Scale the text down if it is wider than this */
  maxWidth?: number;
}

/** A rendered text image with its measured size */
export interface RenderedText {
  /** PNG with transparent background */
  data: Buffer;
  width: number;
  height: number;
}

export interface TextRenderer {
  /** Render text, or resolve to null if no font could render it */
  render(text: string, style: TextStyle): Promise<RenderedText | null>;
}

/** Renders text with one Pango font description and optional font file */
export type RenderWithFont = (markup: string, font: string, fontfile: string | undefined) => Promise<RenderedText>;

/**
 * Render Pango markup with sharp at 72 dpi, so point sizes equal pixels.
 */
export const renderPangoText: RenderWithFont = async (markup, font, fontfile) => {
  const { data, info } = await sharp({
    text: { text: markup, font, fontfile, rgba: true, dpi: 72 },
  })
    .png()
    .toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height };
};

/**
 * Pango font description, e.g. 'DejaVu Sans Bold 60'.
 */
export function fontDescription(family: string, size: number, bold = false): string {
  return `${family}${bold ? " Bold" : ""} ${size}`;
}

/**
 * Pango markup that draws escaped text in a colour.
 */
export function colorMarkup(text: string, color: string): string {
  return `<span foreground="${escapeXml(color)}">${escapeXml(text)}</span>`;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function fitWidth(rendered: RenderedText, maxWidth: number | undefined): Promise<RenderedText> {
  if (maxWidth === undefined || rendered.width <= maxWidth) return rendered;
  const { data, info } = await sharp(rendered.data)
    .resize({ width: maxWidth })
    .png()
    .toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height };
}

/**
 * Create a text renderer that tries each font candidate in order.
 * A candidate is skipped when its font file is missing or rendering fails.
 *
 * @param options.candidates - Fonts to try (default: FONT_CANDIDATES)
 * @param options.renderWithFont - Rasterizer (default: sharp/Pango)
 */
export function createTextRenderer(
  options: { candidates?: readonly FontCandidate[]; renderWithFont?: RenderWithFont; logger?: Logger } = {},
): TextRenderer {
  const candidates = options.candidates ?? FONT_CANDIDATES;
  const renderWithFont = options.renderWithFont ?? renderPangoText;
  const logger = options.logger ?? silentLogger;

  return {
    async render(text, style) {
      if (!text.trim()) return null;
      const markup = colorMarkup(text, style.color);

      for (const candidate of candidates) {
        const fontfile = style.bold ? candidate.boldFile : candidate.regularFile;
        if (fontfile && !(await fileExists(fontfile))) {
          logger.debug(`Font file not found: ${fontfile}`);
          continue;
        }

        try {
          const rendered = await renderWithFont(markup, fontDescription(candidate.family, style.size, style.bold), fontfile);
          return await fitWidth(rendered, style.maxWidth);
        } catch (error) {
          logger.debug(`Font ${candidate.family} failed: ${getErrorMessage(error)}`);
        }
      }

      logger.warn(`No font could render text: ${text}`);
      return null;
    },
  };
}
