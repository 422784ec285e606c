// 64-bit FNV-1a, fed incrementally

const OFFSET_BASIS = 0xcbf29ce484222325n;
const PRIME = 0x100000001b3n;
const MASK = 0xffffffffffffffffn;

const encoder = new TextEncoder();

export class Fnv1a64 {
  private state = OFFSET_BASIS;

  public update(data: string | Uint8Array): this {
    const bytes = typeof data === 'string' ? encoder.encode(data) : data;
    let hash = this.state;
    for (const byte of bytes) {
      hash ^= BigInt(byte);
      hash = (hash * PRIME) & MASK;
    }
    this.state = hash;
    return this;
  }

  public digest(): bigint {
    return this.state;
  }

  public digestHex(): string {
    return this.state.toString(16).padStart(16, '0');
  }
}

export function fnv1a64(data: string | Uint8Array): bigint {
  return new Fnv1a64().update(data).digest();
}
