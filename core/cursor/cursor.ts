/**
 * Cursor and viewport state.
 *
 * `x` is the column the user last chose horizontally and survives
 * vertical moves; `renderX` is that column clamped to the current line.
 * The viewport offsets only change in `changeOffset`.
 */

export type CursorDirection = 'up' | 'down' | 'left' | 'right';

export interface Position {
  x: number;
  y: number;
}

export interface ViewportSize {
  width: number;
  height: number;
}

export interface RenderPosition {
  column: number;
  row: number;
}

/** The line-length queries a cursor needs from its buffer. */
export interface LineMetrics {
  readonly lineCount: number;
  lineLen(index: number): number;
}

export class Cursor {
  private _x: number = 0;
  private _y: number = 0;
  private _renderX: number = 0;
  private _xOffset: number = 0;
  private _yOffset: number = 0;
  private _size: ViewportSize;

  constructor(size: ViewportSize) {
    this._size = clampSize(size);
  }

  get x(): number { return this._x; }
  get y(): number { return this._y; }
  get renderX(): number { return this._renderX; }
  get xOffset(): number { return this._xOffset; }
  get yOffset(): number { return this._yOffset; }
  get size(): ViewportSize { return { ...this._size }; }

  /** Index of the line the cursor is on. */
  get lineIndex(): number {
    return this._y;
  }

  move(direction: CursorDirection, buffer: LineMetrics): void {
    const lastLine = buffer.lineCount - 1;

    switch (direction) {
      case 'up':
        if (this._y > 0) {
          this._y--;
          this._renderX = Math.min(this._x, buffer.lineLen(this._y));
        }
        break;
      case 'down':
        if (this._y < lastLine) {
          this._y++;
          this._renderX = Math.min(this._x, buffer.lineLen(this._y));
        }
        break;
      case 'right':
        this._x = this._renderX;
        if (this._x < buffer.lineLen(this._y)) {
          this._x++;
        } else if (this._y < lastLine) {
          this._y++;
          this._x = 0;
        }
        this._renderX = this._x;
        break;
      case 'left':
        this._x = this._renderX;
        if (this._x > 0) {
          this._x--;
        } else if (this._y > 0) {
          this._y--;
          this._x = buffer.lineLen(this._y);
        }
        this._renderX = this._x;
        break;
    }
  }

  /**
   * Scroll the viewport by exactly the distance the cursor lies outside
   * it, checking up, right, down and left in that order.
   */
  changeOffset(): void {
    const { width, height } = this._size;

    if (this._y < this._yOffset) {
      this._yOffset = this._y;
    }
    if (this._renderX > this._xOffset + width - 1) {
      this._xOffset = this._renderX - width + 1;
    }
    if (this._y > this._yOffset + height - 1) {
      this._yOffset = this._y - height + 1;
    }
    if (this._renderX < this._xOffset) {
      this._xOffset = this._renderX;
    }
  }

  /** Logical position actually in use: (renderX, y). */
  getPosition(): Position {
    return { x: this._renderX, y: this._y };
  }

  setPosition(x: number, y: number): void {
    this._x = x;
    this._renderX = x;
    this._y = y;
  }

  getOffset(): Position {
    return { x: this._xOffset, y: this._yOffset };
  }

  /** Viewport-relative position; chrome margins are the renderer's concern. */
  getRenderPosition(): RenderPosition {
    return { column: this._renderX - this._xOffset, row: this._y - this._yOffset };
  }

  resize(size: ViewportSize): void {
    this._size = clampSize(size);
  }

  /** Back to the document start with the viewport unscrolled. */
  reset(): void {
    this._x = 0;
    this._y = 0;
    this._renderX = 0;
    this._xOffset = 0;
    this._yOffset = 0;
  }

  clone(): Cursor {
    const copy = new Cursor(this._size);
    copy.restore(this);
    return copy;
  }

  /** Copy every field from another cursor. */
  restore(from: Cursor): void {
    this._x = from._x;
    this._y = from._y;
    this._renderX = from._renderX;
    this._xOffset = from._xOffset;
    this._yOffset = from._yOffset;
    this._size = { ...from._size };
  }
}

function clampSize(size: ViewportSize): ViewportSize {
  return { width: Math.max(1, size.width), height: Math.max(1, size.height) };
}
