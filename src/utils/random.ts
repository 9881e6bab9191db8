// randomBytes uses the Web Crypto API for masking keys and handshake nonces.
export function randomBytes(n: number): Uint8Array {
  const out = new Uint8Array(n);
  crypto.getRandomValues(out);
  return out;
}
