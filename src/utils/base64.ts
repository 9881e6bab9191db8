// base64Encode encodes bytes with the standard alphabet and padding.
export function base64Encode(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}

// base64Decode decodes padded standard base64, rejecting anything else.
export function base64Decode(s: string): Uint8Array {
  // Node's Buffer decoder silently skips invalid characters.
  if (s.length % 4 !== 0 || !/^[A-Za-z0-9+/]*={0,2}$/.test(s)) throw new Error("invalid base64");
  const out = new Uint8Array(Buffer.from(s, "base64"));
  // Roundtrip catches non-canonical trailing bits.
  if (base64Encode(out) !== s) throw new Error("invalid base64");
  return out;
}
