import { DivKey } from "./defs";
import { GlobalAttributes } from "./attrs";
import { keyHash } from "./digest";
import { PreconditionError } from "./errors";

/**
 * Constant-time key lookups over the key hashes computed by
 * updateAttributes, without scanning the key list.
 */
export class KeyIndex {
  private readonly positions: ReadonlyMap<string, number>;

  constructor(hashes: ReadonlyArray<string>) {
    const positions = new Map<string, number>();
    hashes.forEach((h, i) => {
      if (!positions.has(h)) {
        positions.set(h, i);
      }
    });
    this.positions = positions;
  }

  static fromAttributes(attrs: Partial<GlobalAttributes>): KeyIndex {
    if (attrs.keyHashes === undefined) {
      throw new PreconditionError(
        "KeyIndex: no key hashes; run updateAttributes first"
      );
    }
    return new KeyIndex(attrs.keyHashes);
  }

  get size(): number {
    return this.positions.size;
  }

  has(key: DivKey): boolean {
    return this.positions.has(keyHash(key));
  }

  // position of key in the keys attribute, or -1
  indexOf(key: DivKey): number {
    return this.positions.get(keyHash(key)) ?? -1;
  }
}
