import sharp from "sharp";
import { describe, expect, it, vi } from "vitest";
import { colorMarkup, createTextRenderer, fontDescription, type RenderedText, type RenderWithFont } from "./text.js";

async function blankText(width: number, height: number): Promise<RenderedText> {
  const data = await sharp({ create: { width, height, channels: 4, background: { r: 0, g: 0, b: 0, alpha: 0 } } })
    .png()
    .toBuffer();
  return { data, width, height };
}

describe("fontDescription", () => {
  it("builds Pango font descriptions", () => {
    expect(fontDescription("DejaVu Sans", 60, true)).toBe("DejaVu Sans Bold 60");
    expect(fontDescription("sans", 24)).toBe("sans 24");
  });
});

describe("colorMarkup", () => {
  it("wraps escaped text in a coloured span", () => {
    expect(colorMarkup("Tom & Jerry <3", "#ffffff")).toBe('<span foreground="#ffffff">Tom &amp; Jerry &lt;3</span>');
  });
});

describe("createTextRenderer", () => {
  it("renders with the first working candidate", async () => {
    const renderWithFont = vi.fn<RenderWithFont>().mockImplementation(() => blankText(120, 30));
    const renderer = createTextRenderer({ candidates: [{ family: "First" }, { family: "Second" }], renderWithFont });

    const result = await renderer.render("Hello", { size: 24, color: "#ffffff" });

    expect(result).toMatchObject({ width: 120, height: 30 });
    expect(renderWithFont).toHaveBeenCalledTimes(1);
    expect(renderWithFont).toHaveBeenCalledWith('<span foreground="#ffffff">Hello</span>', "First 24", undefined);
  });

  it("skips candidates whose font file is missing", async () => {
    const renderWithFont = vi.fn<RenderWithFont>().mockImplementation(() => blankText(50, 20));
    const renderer = createTextRenderer({
      candidates: [{ family: "Missing", boldFile: "/nonexistent/fonts/Missing-Bold.ttf" }, { family: "sans" }],
      renderWithFont,
    });

    await renderer.render("Title", { size: 60, bold: true, color: "#ffffff" });

    expect(renderWithFont).toHaveBeenCalledTimes(1);
    expect(renderWithFont.mock.calls[0][1]).toBe("sans Bold 60");
    expect(renderWithFont.mock.calls[0][2]).toBeUndefined();
  });

  it("falls through to the next candidate when rendering throws", async () => {
    const debug = vi.fn();
    const logger = { debug, info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn() };
    const renderWithFont = vi
      .fn<RenderWithFont>()
      .mockRejectedValueOnce(new Error("font not usable"))
      .mockImplementation(() => blankText(80, 20));
    const renderer = createTextRenderer({ candidates: [{ family: "Broken" }, { family: "sans" }], renderWithFont, logger });

    const result = await renderer.render("Title", { size: 30, color: "#cccccc" });

    expect(result?.width).toBe(80);
    expect(debug).toHaveBeenCalledWith("Font Broken failed: font not usable");
  });

  it("resolves to null when every candidate fails", async () => {
    const warn = vi.fn();
    const logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn(), child: vi.fn() };
    const renderWithFont = vi.fn<RenderWithFont>().mockRejectedValue(new Error("no fonts"));
    const renderer = createTextRenderer({ candidates: [{ family: "sans" }], renderWithFont, logger });

    await expect(renderer.render("Title", { size: 30, color: "#cccccc" })).resolves.toBeNull();
    expect(warn).toHaveBeenCalledWith("No font could render text: Title");
  });

  it("returns null for blank text without rendering", async () => {
    const renderWithFont = vi.fn<RenderWithFont>();
    const renderer = createTextRenderer({ candidates: [{ family: "sans" }], renderWithFont });

    expect(await renderer.render("   ", { size: 30, color: "#cccccc" })).toBeNull();
    expect(renderWithFont).not.toHaveBeenCalled();
  });

  it("scales text down to the maximum width", async () => {
    const renderWithFont = vi.fn<RenderWithFont>().mockImplementation(() => blankText(400, 40));
    const renderer = createTextRenderer({ candidates: [{ family: "sans" }], renderWithFont });

    const result = await renderer.render("A very long title", { size: 40, color: "#ffffff", maxWidth: 200 });

    expect(result).toMatchObject({ width: 200, height: 20 });
  });
});
