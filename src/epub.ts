/**
 * EPUB 2 packaging
 *
 * Archive layout:
 *   mimetype                 (stored, first entry)
 *   META-INF/container.xml
 *   OEBPS/content.opf        package metadata, manifest and spine
 *   OEBPS/toc.ncx            navigation
 *   OEBPS/cover.jpg          (with a cover)
 *   OEBPS/cover.html         (with a cover)
 *   OEBPS/article<i>.html    one page per article, in input order
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { JSDOM } from "jsdom";
import JSZip from "jszip";
import { silentLogger, type Logger } from "./logger.js";
import type { Article } from "./types.js";
import { escapeXml } from "./utils.js";

export const EPUB_MIMETYPE = "application/epub+zip";
export const BOOK_LANGUAGE = "en";

const XHTML_DOCTYPE =
  '<!DOCTYPE html PUBLIC "-//W3C//DTD XHTML 1.1//EN" "http://www.w3.org/TR/xhtml11/DTD/xhtml11.dtd">';
const NCX_DOCTYPE = '<!DOCTYPE ncx PUBLIC "-//NISO//DTD ncx 2005-1//EN" "http://www.daisy.org/z3986/2005/ncx-2005-1.dtd">';

/** Book-level metadata */
export interface BookOptions {
  title: string;
  author: string;
  /** Cover image as JPEG bytes */
  cover?: Buffer | null;
  /** Unique identifier without the urn:uuid: prefix (default: random UUID) */
  identifier?: string;
  /** Creation date (default: now) */
  date?: Date;
}

/** A manifest entry; ids and hrefs derive from position only */
export interface ManifestItem {
  id: string;
  href: string;
  mediaType: string;
}

/** A page in reading order */
export interface SpineEntry {
  idref: string;
  href: string;
  label: string;
  playOrder: number;
}

export function articleId(index: number): string {
  return `article${index}`;
}

export function articleHref(index: number): string {
  return `${articleId(index)}.html`;
}

/**
 * Manifest of the book: navigation, cover image and page, then one page per article.
 */
export function buildManifest(articleCount: number, hasCover: boolean): ManifestItem[] {
  const items: ManifestItem[] = [{ id: "ncx", href: "toc.ncx", mediaType: "application/x-dtbncx+xml" }];
  if (hasCover) {
    items.push({ id: "cover-image", href: "cover.jpg", mediaType: "image/jpeg" });
    items.push({ id: "cover", href: "cover.html", mediaType: "application/xhtml+xml" });
  }
  for (let i = 0; i < articleCount; i++) {
    items.push({ id: articleId(i), href: articleHref(i), mediaType: "application/xhtml+xml" });
  }
  return items;
}

/**
 * Reading order: cover page first when present, then articles in input order.
 * Play order is 1-based across the whole spine.
 */
export function buildSpine(articles: readonly Pick<Article, "title">[], hasCover: boolean): SpineEntry[] {
  const entries: SpineEntry[] = [];
  if (hasCover) {
    entries.push({ idref: "cover", href: "cover.html", label: "Cover", playOrder: 1 });
  }
  articles.forEach((article, index) => {
    entries.push({
      idref: articleId(index),
      href: articleHref(index),
      label: article.title,
      playOrder: entries.length + 1,
    });
  });
  return entries;
}

export function containerXml(): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
    <rootfiles>
        <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
    </rootfiles>
</container>
`;
}

/** YYYY-MM-DD in local time */
export function formatBookDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

export function contentOpf(
  meta: { title: string; author: string; identifier: string; date: Date },
  manifest: readonly ManifestItem[],
  spine: readonly SpineEntry[],
  hasCover: boolean,
): string {
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<package xmlns="http://www.idpf.org/2007/opf" xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:opf="http://www.idpf.org/2007/opf" version="2.0" unique-identifier="bookid">',
    "  <metadata>",
    `    <dc:title>${escapeXml(meta.title)}</dc:title>`,
    `    <dc:creator opf:role="aut">${escapeXml(meta.author)}</dc:creator>`,
    `    <dc:language>${BOOK_LANGUAGE}</dc:language>`,
    `    <dc:date>${formatBookDate(meta.date)}</dc:date>`,
    `    <dc:identifier id="bookid">urn:uuid:${escapeXml(meta.identifier)}</dc:identifier>`,
  ];
  if (hasCover) {
    lines.push('    <meta name="cover" content="cover-image"/>');
  }
  lines.push("  </metadata>", "  <manifest>");
  for (const item of manifest) {
    lines.push(`    <item id="${item.id}" href="${item.href}" media-type="${item.mediaType}"/>`);
  }
  lines.push("  </manifest>", '  <spine toc="ncx">');
  for (const entry of spine) {
    lines.push(`    <itemref idref="${entry.idref}"/>`);
  }
  lines.push("  </spine>", "</package>", "");
  return lines.join("\n");
}

export function tocNcx(meta: { title: string; identifier: string }, spine: readonly SpineEntry[]): string {
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    NCX_DOCTYPE,
    `<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1" xml:lang="${BOOK_LANGUAGE}">`,
    "  <head>",
    `    <meta name="dtb:uid" content="urn:uuid:${escapeXml(meta.identifier)}"/>`,
    '    <meta name="dtb:depth" content="1"/>',
    '    <meta name="dtb:totalPageCount" content="0"/>',
    '    <meta name="dtb:maxPageNumber" content="0"/>',
    "  </head>",
    "  <docTitle>",
    `    <text>${escapeXml(meta.title)}</text>`,
    "  </docTitle>",
    "  <navMap>",
  ];
  for (const entry of spine) {
    lines.push(
      `    <navPoint id="${entry.idref}" playOrder="${entry.playOrder}">`,
      "      <navLabel>",
      `        <text>${escapeXml(entry.label)}</text>`,
      "      </navLabel>",
      `      <content src="${entry.href}"/>`,
      "    </navPoint>",
    );
  }
  lines.push("  </navMap>", "</ncx>", "");
  return lines.join("\n");
}

export function coverHtml(): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
${XHTML_DOCTYPE}
<html xmlns="http://www.w3.org/1999/xhtml">
<head>
    <title>Cover</title>
    <style type="text/css">
        body { margin: 0; padding: 0; text-align: center; }
        img { max-width: 100%; max-height: 100%; }
    </style>
</head>
<body>
    <div>
        <img src="cover.jpg" alt="Cover" />
    </div>
</body>
</html>
`;
}

/**
 * Re-serialize an HTML fragment as well-formed XHTML inside a content div.
 */
export function toXhtmlFragment(html: string): string {
  const { window } = new JSDOM("");
  const container = window.document.createElement("div");
  container.setAttribute("class", "content");
  container.innerHTML = html;
  return new window.XMLSerializer().serializeToString(container);
}

const ARTICLE_STYLE = `        body {
            font-family: Georgia, serif;
            line-height: 1.6;
            margin: 1em;
        }
        h1 {
            font-size: 1.8em;
            margin-bottom: 0.5em;
        }
        h2 {
            font-size: 1.4em;
            margin-top: 1em;
        }
        p {
            margin: 1em 0;
            text-align: justify;
        }
        a {
            color: #0066cc;
            text-decoration: none;
        }
        img {
            max-width: 100%;
        }
        .meta {
            color: #666;
            font-size: 0.9em;
            margin-bottom: 1em;
        }`;

/**
 * XHTML page for one article: heading, byline, date, source link and body.
 */
export function articleHtml(article: Article): string {
  const meta = [
    article.author ? `        <p>By ${escapeXml(article.author)}</p>` : null,
    article.date ? `        <p>${escapeXml(article.date)}</p>` : null,
    `        <p><a href="${escapeXml(article.url)}">Source</a></p>`,
  ].filter((line): line is string => line !== null);

  return `<?xml version="1.0" encoding="UTF-8"?>
${XHTML_DOCTYPE}
<html xmlns="http://www.w3.org/1999/xhtml">
<head>
    <title>${escapeXml(article.title)}</title>
    <style type="text/css">
${ARTICLE_STYLE}
    </style>
</head>
<body>
    <h1>${escapeXml(article.title)}</h1>
    <div class="meta">
${meta.join("\n")}
    </div>
    ${toXhtmlFragment(article.contentHtml)}
</body>
</html>
`;
}

export class EpubGenerator {
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Build the EPUB archive in memory.
   *
   * @returns Archive bytes
   */
  async buildEpub(articles: readonly Article[], options: BookOptions): Promise<Buffer> {
    const identifier = options.identifier ?? randomUUID();
    const date = options.date ?? new Date();
    const cover = options.cover && options.cover.length > 0 ? options.cover : null;
    const hasCover = cover !== null;

    this.logger.info(`Creating EPUB with ${articles.length} articles`);

    const manifest = buildManifest(articles.length, hasCover);
    const spine = buildSpine(articles, hasCover);
    const meta = { title: options.title, author: options.author, identifier, date };

    const zip = new JSZip();
    const entry = { date, createFolders: false };
    // Entry order is insertion order; mimetype must come first and uncompressed
    zip.file("mimetype", EPUB_MIMETYPE, { ...entry, compression: "STORE" });
    zip.file("META-INF/container.xml", containerXml(), entry);
    zip.file("OEBPS/content.opf", contentOpf(meta, manifest, spine, hasCover), entry);
    zip.file("OEBPS/toc.ncx", tocNcx(meta, spine), entry);

    if (cover) {
      zip.file("OEBPS/cover.jpg", cover, entry);
      zip.file("OEBPS/cover.html", coverHtml(), entry);
    }

    articles.forEach((article, index) => {
      zip.file(`OEBPS/${articleHref(index)}`, articleHtml(article), entry);
    });

    return await zip.generateAsync({
      type: "nodebuffer",
      mimeType: EPUB_MIMETYPE,
      compression: "DEFLATE",
      compressionOptions: { level: 9 },
    });
  }

  /**
   * Build the EPUB and write it to a file, creating parent directories.
   *
   * @returns Size of the written file in bytes
   */
  async createEpub(articles: readonly Article[], options: BookOptions & { outputPath: string }): Promise<number> {
    const data = await this.buildEpub(articles, options);
    await fs.mkdir(path.dirname(options.outputPath), { recursive: true });
    await fs.writeFile(options.outputPath, data);
    this.logger.info(`EPUB created successfully: ${options.outputPath}`);
    return data.length;
  }
}
