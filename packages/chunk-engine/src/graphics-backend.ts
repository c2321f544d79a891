/**
 * SVG file backend: writes figures to disk and clears the surface.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Figure, type GraphicsSurface } from "./figure.js";
import type { GraphicArtifact, GraphicsBackend, Resolution } from "./types.js";

export class SvgFileBackend implements GraphicsBackend {
  constructor(private readonly surface: GraphicsSurface) {}

  isGraphic(value: unknown): boolean {
    return value instanceof Figure;
  }

  async render(graphic: unknown, filePath: string, resolution: Resolution): Promise<GraphicArtifact> {
    if (!(graphic instanceof Figure)) {
      throw new TypeError("SvgFileBackend can only render Figure values");
    }
    // Serialize before the first await so later drawing cannot leak in
    const svg = graphic.toSVG(resolution.dpi);

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, svg, "utf-8");

    return {
      path: filePath,
      format: "svg",
      width: Math.round(graphic.width * resolution.dpi),
      height: Math.round(graphic.height * resolution.dpi),
    };
  }

  clearSurface(): void {
    this.surface.clf();
  }
}
