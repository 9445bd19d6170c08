/**
 * Decode base64 key material into a buffer that lives only for the duration
 * of `use`. The buffer is zero-filled on every exit path, including throws.
 */
export function withKeyMaterial<T>(base64: string, use: (material: Buffer) => T): T {
  const material = Buffer.from(base64, 'base64');
  try {
    return use(material);
  } finally {
    material.fill(0);
  }
}
