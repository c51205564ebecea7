import { InvalidGeometryError } from '../errors';

export interface RectEdges {
  left: number;
  right: number;
  top: number;
  bottom: number;
}

export interface RegionOptions {
  /** Truncate every coordinate to an integer after each change (default: true) */
  forceInt?: boolean;
}

/**
 * Axis-aligned rectangle, origin (0,0) at the top-left.
 *
 * Holds both an edge view (left/right/top/bottom) and a center/size view
 * (x/y/width/height). Every mutation goes through setRect, setXy or setSize,
 * which recalibrate the other view before returning.
 */
export class Region {
  // Rect
  private _left = 0;
  private _right = 0;
  private _top = 0;
  private _bottom = 0;

  // Position
  private _x = 0;
  private _y = 0;

  // Scale
  private _width = 0;
  private _height = 0;

  readonly forceInt: boolean;

  constructor(rect: Partial<RectEdges> = {}, options: RegionOptions = {}) {
    this.forceInt = options.forceInt ?? true;
    this.setRect(rect.left ?? 0, rect.right ?? 0, rect.top ?? 0, rect.bottom ?? 0);
  }

  toString(): string {
    return `[Region x: ${this.x} y: ${this.y} width: ${this.width} height: ${this.height}]`;
  }

  // -------- Explicit setters --------

  setRect(left: number, right: number, top: number, bottom: number): void {
    if (right < left) {
      throw new InvalidGeometryError(`Right (${right}) must not be less than left (${left}).`);
    }
    if (bottom < top) {
      throw new InvalidGeometryError(`Bottom (${bottom}) must not be less than top (${top}).`);
    }

    this._left = left;
    this._right = right;
    this._top = top;
    this._bottom = bottom;
    this.calibrateToRect();
  }

  setXy(x?: number, y?: number): void {
    if (x !== undefined) this._x = x;
    if (y !== undefined) this._y = y;
    this.calibrateToXy();
  }

  setSize(width: number, height: number): void {
    if (width < 0 || height < 0) {
      throw new InvalidGeometryError(`Size (${width} x ${height}) must not be negative.`);
    }

    this._width = width;
    this._height = height;
    this.calibrateToXy();
  }

  // -------- Utility --------

  contains(x: number, y: number): boolean {
    return x >= this._left && x <= this._right && y >= this._top && y <= this._bottom;
  }

  /** True when the whole region sits inside a frame of the given size. */
  isInBounds(width: number, height: number): boolean {
    return this._left >= 0 && this._top >= 0 && this._right <= width && this._bottom <= height;
  }

  clone(): Region {
    return new Region(this.edges(), { forceInt: this.forceInt });
  }

  /** Grow one side so that width/height reaches the aspect ratio. Never shrinks. */
  expandToRatio(aspectRatio = 1.0): void {
    const aspectWidth = this.divide(this._height, aspectRatio);
    const aspectHeight = this.divide(this._width, aspectRatio);

    if (aspectWidth > this._width) {
      this.setSize(aspectWidth, this._height);
    } else if (aspectHeight > this._height) {
      this.setSize(this._width, aspectHeight);
    }
  }

  scale(factor = 1.0): void {
    this.setSize(this._width * factor, this._height * factor);
  }

  edges(): RectEdges {
    return { left: this._left, right: this._right, top: this._top, bottom: this._bottom };
  }

  // -------- Calibration --------

  private convertToInt(): void {
    this._width = Math.trunc(this._width);
    this._height = Math.trunc(this._height);
    this._left = Math.trunc(this._left);
    this._right = Math.trunc(this._right);
    this._top = Math.trunc(this._top);
    this._bottom = Math.trunc(this._bottom);
    this._x = Math.trunc(this._x);
    this._y = Math.trunc(this._y);
  }

  private calibrateToRect(): void {
    if (this.forceInt) this.convertToInt();

    this._width = this._right - this._left;
    this._height = this._bottom - this._top;
    this._x = this._left + this.divide(this._width, 2);
    this._y = this._top + this.divide(this._height, 2);
  }

  private calibrateToXy(): void {
    if (this.forceInt) this.convertToInt();

    this._left = this._x - this.divide(this._width, 2);
    this._right = this._left + this._width;
    this._top = this._y - this.divide(this._height, 2);
    this._bottom = this._top + this._height;
  }

  // Floor division in integer mode
  private divide(value: number, by: number): number {
    return this.forceInt ? Math.floor(value / by) : value / by;
  }

  // -------- Accessors --------

  get x(): number { return this._x; }
  set x(value: number) { this.setXy(value, undefined); }

  get y(): number { return this._y; }
  set y(value: number) { this.setXy(undefined, value); }

  get left(): number { return this._left; }
  set left(value: number) { this.setRect(value, this._right, this._top, this._bottom); }

  get right(): number { return this._right; }
  set right(value: number) { this.setRect(this._left, value, this._top, this._bottom); }

  get top(): number { return this._top; }
  set top(value: number) { this.setRect(this._left, this._right, value, this._bottom); }

  get bottom(): number { return this._bottom; }
  set bottom(value: number) { this.setRect(this._left, this._right, this._top, value); }

  get width(): number { return this._width; }
  set width(value: number) { this.setSize(value, this._height); }

  get height(): number { return this._height; }
  set height(value: number) { this.setSize(this._width, value); }

  get biggestEdge(): number {
    return Math.max(this._width, this._height);
  }

  get area(): number {
    return this._width * this._height;
  }

  // -------- Static --------

  static distance(a: Region, b: Region): number {
    return Math.sqrt((b.x - a.x) ** 2 + (b.y - a.y) ** 2);
  }

  /** Manhattan distance between centers; cheaper, same ordering along one axis. */
  static fastDistance(a: Region, b: Region): number {
    return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
  }
}
