export class Vector2 {
  static readonly zero = new Vector2(0, 0);
  static readonly one = new Vector2(1, 1);

  constructor(
    readonly x: number,
    readonly y: number,
  ) {}

  equals(other: Vector2): boolean {
    return this.x === other.x && this.y === other.y;
  }

  toString(): string {
    return `(${this.x}, ${this.y})`;
  }
}

export class Vector3 {
  static readonly zero = new Vector3(0, 0, 0);
  static readonly one = new Vector3(1, 1, 1);

  constructor(
    readonly x: number,
    readonly y: number,
    readonly z: number,
  ) {}

  equals(other: Vector3): boolean {
    return this.x === other.x && this.y === other.y && this.z === other.z;
  }

  toString(): string {
    return `(${this.x}, ${this.y}, ${this.z})`;
  }
}

export class Color {
  static readonly clear = new Color(0, 0, 0, 0);
  static readonly white = new Color(1, 1, 1, 1);

  constructor(
    readonly r: number,
    readonly g: number,
    readonly b: number,
    readonly a = 1,
  ) {}

  equals(other: Color): boolean {
    return this.r === other.r && this.g === other.g && this.b === other.b && this.a === other.a;
  }

  toString(): string {
    return `rgba(${this.r}, ${this.g}, ${this.b}, ${this.a})`;
  }
}
