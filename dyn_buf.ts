// ----------------------------------------------------
// Dynamic Buffer: bytes read from the socket but not yet consumed
// ----------------------------------------------------
export type DynBuf = {
  data: Buffer; // data.length is capacity
  length: number;
};

export function newDynBuf(): DynBuf {
  return { data: Buffer.alloc(0), length: 0 };
}

// append data, growing the capacity by doubling
export function bufPush(buf: DynBuf, data: Buffer): void {
  const newLen = buf.length + data.length;
  if (buf.data.length < newLen) {
    let cap = Math.max(buf.data.length || 32, 32);
    while (cap < newLen) cap *= 2;
    const grown = Buffer.alloc(cap);
    buf.data.copy(grown, 0, 0, buf.length);
    buf.data = grown;
  }
  data.copy(buf.data, buf.length, 0);
  buf.length = newLen;
}

// remove len bytes from the front
export function bufPop(buf: DynBuf, len: number): void {
  buf.data.copy(buf.data, 0, len, buf.length);
  buf.length -= len;
}

// take len bytes from the front as a new buffer
export function bufTake(buf: DynBuf, len: number): Buffer {
  const out = Buffer.from(buf.data.subarray(0, len));
  bufPop(buf, len);
  return out;
}

// cut one line including its '\n', or null if no complete line is buffered
export function cutLine(buf: DynBuf): Buffer | null {
  const idx = buf.data.subarray(0, buf.length).indexOf("\n");
  if (idx < 0) return null;
  return bufTake(buf, idx + 1);
}
