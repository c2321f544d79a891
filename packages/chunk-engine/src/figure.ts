/**
 * Figures and the graphics surface.
 *
 * Guest code draws through the `plt` binding. Drawing calls target the
 * current figure and return it, so a trailing `plt.line(...)` evaluates to a
 * graphic value. `plt.show()` hands the current figure to whatever sink is
 * attached to the surface.
 */

import type { GraphicsSink } from "./types.js";

export type Point = readonly [number, number];

export interface StrokeOptions {
  color?: string;
  width?: number;
}

export interface FillOptions {
  fill?: string;
  stroke?: string;
}

export interface TextOptions {
  size?: number;
  color?: string;
}

/** Points per inch; figure coordinates are in points */
const POINTS_PER_INCH = 72;

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * A drawing. Coordinates are points from the top-left corner; the canvas is
 * `width * 72` by `height * 72` points.
 */
export class Figure {
  private readonly elements: string[] = [];

  constructor(
    /** Inches */
    readonly width: number,
    /** Inches */
    readonly height: number
  ) {}

  get isEmpty(): boolean {
    return this.elements.length === 0;
  }

  line(points: readonly Point[], options: StrokeOptions = {}): this {
    const { color = "black", width = 1 } = options;
    const coords = points.map(([x, y]) => `${x},${y}`).join(" ");
    this.elements.push(
      `<polyline points="${coords}" fill="none" stroke="${escapeXml(color)}" stroke-width="${width}"/>`
    );
    return this;
  }

  rect(x: number, y: number, width: number, height: number, options: FillOptions = {}): this {
    const { fill = "black", stroke = "none" } = options;
    this.elements.push(
      `<rect x="${x}" y="${y}" width="${width}" height="${height}" fill="${escapeXml(fill)}" stroke="${escapeXml(stroke)}"/>`
    );
    return this;
  }

  circle(cx: number, cy: number, r: number, options: FillOptions = {}): this {
    const { fill = "black", stroke = "none" } = options;
    this.elements.push(
      `<circle cx="${cx}" cy="${cy}" r="${r}" fill="${escapeXml(fill)}" stroke="${escapeXml(stroke)}"/>`
    );
    return this;
  }

  text(x: number, y: number, content: string, options: TextOptions = {}): this {
    const { size = 12, color = "black" } = options;
    this.elements.push(
      `<text x="${x}" y="${y}" font-size="${size}" fill="${escapeXml(color)}">${escapeXml(content)}</text>`
    );
    return this;
  }

  title(content: string): this {
    const x = (this.width * POINTS_PER_INCH) / 2;
    this.elements.push(
      `<text x="${x}" y="16" font-size="14" text-anchor="middle">${escapeXml(content)}</text>`
    );
    return this;
  }

  /**
   * Serialize to SVG. `dpi` sets the pixel size; drawing coordinates are
   * unaffected.
   */
  toSVG(dpi: number): string {
    const viewWidth = this.width * POINTS_PER_INCH;
    const viewHeight = this.height * POINTS_PER_INCH;
    const pixelWidth = Math.round(this.width * dpi);
    const pixelHeight = Math.round(this.height * dpi);
    return [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${pixelWidth}" height="${pixelHeight}" viewBox="0 0 ${viewWidth} ${viewHeight}">`,
      ...this.elements.map((element) => `  ${element}`),
      "</svg>",
      "",
    ].join("\n");
  }
}

/** The `plt` object seen by guest code */
export interface PlotApi {
  figure(width?: number, height?: number): Figure;
  gcf(): Figure;
  clf(): void;
  show(graphic?: unknown): undefined;
  line(points: readonly Point[], options?: StrokeOptions): Figure;
  rect(x: number, y: number, width: number, height: number, options?: FillOptions): Figure;
  circle(cx: number, cy: number, r: number, options?: FillOptions): Figure;
  text(x: number, y: number, content: string, options?: TextOptions): Figure;
  title(content: string): Figure;
}

/**
 * Holds the current figure and the display sink. One surface lives as long as
 * its interpreter session.
 */
export class GraphicsSurface {
  private current: Figure | undefined;
  private sink: GraphicsSink | undefined;
  /** Default size of new figures, in inches */
  figureSize = { width: 7, height: 5 };

  figure(width = this.figureSize.width, height = this.figureSize.height): Figure {
    this.current = new Figure(width, height);
    return this.current;
  }

  /** Current figure, creating one when there is none */
  gcf(): Figure {
    return this.current ?? this.figure();
  }

  /** Current figure without creating one */
  peek(): Figure | undefined {
    return this.current;
  }

  clf(): void {
    this.current = undefined;
  }

  /**
   * Attach a sink for display calls.
   *
   * @returns A function that detaches it and restores the previous sink
   */
  attachSink(sink: GraphicsSink): () => void {
    const previous = this.sink;
    this.sink = sink;
    return () => {
      this.sink = previous;
    };
  }

  /**
   * Display a graphic, or the current figure when none is given. Without an
   * attached sink, or with nothing drawn, this does nothing.
   */
  show(graphic?: unknown): void {
    const target = graphic ?? this.current;
    if (!this.sink || target === undefined) return;
    this.sink.display(target);
  }

  api(): PlotApi {
    return {
      figure: (width, height) => this.figure(width, height),
      gcf: () => this.gcf(),
      clf: () => this.clf(),
      show: (graphic) => {
        this.show(graphic);
        return undefined;
      },
      line: (points, options) => this.gcf().line(points, options),
      rect: (x, y, width, height, options) => this.gcf().rect(x, y, width, height, options),
      circle: (cx, cy, r, options) => this.gcf().circle(cx, cy, r, options),
      text: (x, y, content, options) => this.gcf().text(x, y, content, options),
      title: (content) => this.gcf().title(content),
    };
  }
}
