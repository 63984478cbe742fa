/** A 2D offset or point as `[x, y]`. */
export type Offset = [number, number]

/**
 * Immutable axis-aligned rectangle described by its four edges.
 * Operations return new rectangles; the receiver never changes.
 */
export class Rect {
  public static readonly zero = new Rect(0, 0, 0, 0)

  public readonly left: number
  public readonly top: number
  public readonly right: number
  public readonly bottom: number

  private constructor (left: number, top: number, right: number, bottom: number) {
    this.left = left
    this.top = top
    this.right = right
    this.bottom = bottom
  }

  public static fromLTRB (left: number, top: number, right: number, bottom: number): Rect {
    return new Rect(left, top, right, bottom)
  }

  public static fromLTWH (left: number, top: number, width: number, height: number): Rect {
    return new Rect(left, top, left + width, top + height)
  }

  public get width (): number {
    return this.right - this.left
  }

  public get height (): number {
    return this.bottom - this.top
  }

  public get topLeft (): Offset {
    return [this.left, this.top]
  }

  /** Midpoint of the rectangle. The default pivot of every transform operation. */
  public get center (): Offset {
    return [this.left + this.width / 2, this.top + this.height / 2]
  }

  public shift (offset: Offset): Rect {
    const [dx, dy] = offset
    return new Rect(this.left + dx, this.top + dy, this.right + dx, this.bottom + dy)
  }

  /** Returns the smallest rectangle containing both this rectangle and `other`. */
  public expandToInclude (other: Rect): Rect {
    return new Rect(
      Math.min(this.left, other.left),
      Math.min(this.top, other.top),
      Math.max(this.right, other.right),
      Math.max(this.bottom, other.bottom)
    )
  }

  public equals (other: Rect): boolean {
    return this.left === other.left &&
      this.top === other.top &&
      this.right === other.right &&
      this.bottom === other.bottom
  }

  public toString (): string {
    return `Rect.fromLTRB(${this.left}, ${this.top}, ${this.right}, ${this.bottom})`
  }
}
