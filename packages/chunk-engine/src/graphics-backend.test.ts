import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Figure, GraphicsSurface } from "./figure.js";
import { SvgFileBackend } from "./graphics-backend.js";

describe("SvgFileBackend", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "chunkweave-backend-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should write figures as SVG files", async () => {
    const backend = new SvgFileBackend(new GraphicsSurface());
    const figure = new Figure(2, 1).rect(0, 0, 10, 10);
    const filePath = path.join(dir, "nested", "plot-1.svg");

    const artifact = await backend.render(figure, filePath, { dpi: 72, width: 2, height: 1 });

    expect(artifact).toEqual({ path: filePath, format: "svg", width: 144, height: 72 });
    expect(await fs.readFile(filePath, "utf-8")).toBe(figure.toSVG(72));
  });

  it("should size artifacts by the figure and dpi", async () => {
    const backend = new SvgFileBackend(new GraphicsSurface());

    const artifact = await backend.render(new Figure(3, 2), path.join(dir, "big.svg"), { dpi: 100, width: 7, height: 5 });

    expect(artifact.width).toBe(300);
    expect(artifact.height).toBe(200);
  });

  it("should recognize figures only", () => {
    const backend = new SvgFileBackend(new GraphicsSurface());

    expect(backend.isGraphic(new Figure(1, 1))).toBe(true);
    expect(backend.isGraphic({ width: 1, height: 1 })).toBe(false);
  });

  it("should reject other values", async () => {
    const backend = new SvgFileBackend(new GraphicsSurface());

    await expect(backend.render("not a figure", path.join(dir, "x.svg"), { dpi: 72, width: 1, height: 1 })).rejects.toThrow(
      TypeError
    );
  });

  it("should clear the surface", () => {
    const surface = new GraphicsSurface();
    surface.gcf();

    new SvgFileBackend(surface).clearSurface();

    expect(surface.peek()).toBeUndefined();
  });
});
