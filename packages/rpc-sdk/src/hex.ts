export function isHex(s: string): boolean {
  return /^[0-9a-fA-F]*$/.test(s);
}

export function hexToBytes(hex: string): Uint8Array {
  if (hex.length % 2 !== 0) throw new Error("Invalid hex length");
  if (!isHex(hex)) throw new Error("Invalid hex");
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = Number.parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

export function bytesToHex(bytes: Uint8Array): string {
  let s = "";
  for (const b of bytes) s += b.toString(16).padStart(2, "0");
  return s;
}

/** 32-byte transaction or block hash, as the daemon prints it (64 hex chars). */
export function isTxidQuery(s: string): boolean {
  return s.length === 64 && isHex(s);
}

export function isHeightQuery(s: string): boolean {
  return /^[0-9]{1,8}$/.test(s);
}
