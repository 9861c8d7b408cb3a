import type { PathLike, Segment } from "./types.js";

const INDEX_PATTERN = /^(0|[1-9]\d*)$/;

/**
 * Immutable location inside the tracked tree: mapping keys and sequence
 * indices from the root. Segments compare by their string form.
 */
export class PathKey {
  static readonly root = new PathKey([]);

  readonly segments: readonly Segment[];
  readonly key: string;

  private constructor(segments: readonly Segment[]) {
    this.segments = Object.freeze([...segments]);
    this.key = JSON.stringify(segments.map(String));
  }

  static of(...segments: Segment[]): PathKey {
    return new PathKey(segments);
  }

  /**
   * "a.b.0" -> ["a", "b", 0]
   */
  static parse(dotted: string): PathKey {
    if (dotted === "") return PathKey.root;
    return new PathKey(
      dotted.split(".").map((part) => (INDEX_PATTERN.test(part) ? Number(part) : part)),
    );
  }

  static from(path: PathLike): PathKey {
    if (path instanceof PathKey) return path;
    if (typeof path === "string") return PathKey.parse(path);
    return new PathKey(path);
  }

  get length(): number {
    return this.segments.length;
  }

  get last(): Segment | undefined {
    return this.segments[this.segments.length - 1];
  }

  get parent(): PathKey | undefined {
    if (this.segments.length === 0) return undefined;
    return new PathKey(this.segments.slice(0, -1));
  }

  child(segment: Segment): PathKey {
    return new PathKey([...this.segments, segment]);
  }

  equals(other: PathKey): boolean {
    return this.key === other.key;
  }

  // Strict: a path is not its own ancestor
  isAncestorOf(other: PathKey): boolean {
    if (this.segments.length >= other.segments.length) return false;
    return this.segments.every((segment, i) => String(segment) === String(other.segments[i]));
  }

  isDescendantOf(other: PathKey): boolean {
    return other.isAncestorOf(this);
  }

  relativeTo(ancestor: PathKey): Segment[] {
    if (!ancestor.isAncestorOf(this) && !ancestor.equals(this)) {
      throw new RangeError(`${ancestor.toDotted()} is not an ancestor of ${this.toDotted()}`);
    }
    return this.segments.slice(ancestor.segments.length);
  }

  compare(other: PathKey): number {
    const shared = Math.min(this.segments.length, other.segments.length);
    for (let i = 0; i < shared; i++) {
      const a = String(this.segments[i]);
      const b = String(other.segments[i]);
      if (a !== b) return a < b ? -1 : 1;
    }
    return this.segments.length - other.segments.length;
  }

  toDotted(): string {
    return this.segments.map(String).join(".");
  }

  toString(): string {
    return this.toDotted();
  }

  toJSON(): Segment[] {
    return [...this.segments];
  }
}
