const encoder = new TextEncoder();
const lenientDecoder = new TextDecoder("utf-8", { ignoreBOM: true });
const strictDecoder = new TextDecoder("utf-8", {
  fatal: true,
  ignoreBOM: true,
});

export function fromString(text: string): Uint8Array {
  return encoder.encode(text);
}

/**
 * Decode UTF-8, replacing invalid sequences with U+FFFD. A leading BOM is kept.
 */
export function decodeToString(data: Uint8Array): string {
  return lenientDecoder.decode(data);
}

/**
 * Decode UTF-8, returning null when the bytes are not valid text.
 */
export function decodeStrict(data: Uint8Array): string | null {
  try {
    return strictDecoder.decode(data);
  } catch {
    return null;
  }
}

export function concat(chunks: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const chunk of chunks) {
    total += chunk.length;
  }
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}
