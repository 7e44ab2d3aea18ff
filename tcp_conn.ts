import type { Duplex } from "stream";
import { bufPush, bufTake, cutLine, newDynBuf } from "./dyn_buf";
import { HTTPError } from "./errors";

/* ==================== TCP WRAPPER ==================== */

// promise-based API over a socket (net.Socket, or any Duplex in tests)
export type TCPConn = {
  socket: Duplex;
  // 'error' event
  err: null | Error;
  // EOF from 'end' event
  ended: boolean;
  // set once the write side has been ended
  closed: boolean;
  // the callbacks of the promise of the current read
  reader: null | { resolve: (v: Buffer) => void; reject: (e: Error) => void };
};

export function soInit(socket: Duplex): TCPConn {
  const conn: TCPConn = { socket, err: null, ended: false, closed: false, reader: null };

  // no 'data' events until somebody reads
  socket.pause();

  socket.on("data", (data: Buffer) => {
    conn.socket.pause();
    if (!conn.reader) {
      conn.err = new Error("data arrived with no pending read");
      return;
    }
    conn.reader.resolve(data);
    conn.reader = null;
  });

  socket.on("end", () => {
    conn.ended = true;
    if (conn.reader) {
      conn.reader.resolve(Buffer.alloc(0)); // EOF
      conn.reader = null;
    }
  });

  socket.on("error", (err: Error) => {
    conn.err = err;
    if (conn.reader) {
      conn.reader.reject(err);
      conn.reader = null;
    }
  });

  return conn;
}

export function soRead(conn: TCPConn): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    if (conn.reader) {
      reject(new Error("concurrent reads on one connection"));
      return;
    }
    // if connection is not readable, complete the promise now
    if (conn.err) {
      reject(conn.err);
      return;
    }
    if (conn.ended) {
      resolve(Buffer.alloc(0));
      return;
    }
    conn.reader = { resolve, reject };
    conn.socket.resume();
  });
}

export function soWrite(conn: TCPConn, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    if (conn.err) {
      reject(conn.err);
      return;
    }
    conn.socket.write(data, (err?: Error | null) => (err ? reject(err) : resolve()));
  });
}

// flush pending writes, then close both sides; later calls are no-ops
export function soEnd(conn: TCPConn): Promise<void> {
  if (conn.closed) return Promise.resolve();
  conn.closed = true;
  return new Promise((resolve) => {
    conn.socket.end(() => {
      // the peer may never send FIN
      conn.socket.destroy();
      resolve();
    });
  });
}

/* ==================== READER / WRITER ==================== */

export type ConnLimits = {
  maxLineLength: number;
  maxHeaderCount: number;
  // deadline for each socket read, none when undefined
  readTimeoutMs?: number;
};

export const kDefaultLimits: ConnLimits = {
  maxLineLength: 8 * 1024, // 8 KB
  maxHeaderCount: 100,
};

export type ConnReader = {
  // one line including '\n'; an empty buffer at EOF
  readline: () => Promise<Buffer>;
  readexactly: (n: number) => Promise<Buffer>;
};

export type ConnWriter = {
  awrite: (data: string | Buffer) => Promise<void>;
  aclose: () => Promise<void>;
  readonly closed: boolean;
};

function readWithDeadline(conn: TCPConn, ms: number | undefined): Promise<Buffer> {
  if (ms === undefined) return soRead(conn);
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new HTTPError("ReadTimeout", `no data within ${ms}ms`)), ms);
  });
  return Promise.race([soRead(conn), deadline]).finally(() => clearTimeout(timer));
}

export function readerFromConn(conn: TCPConn, limits: ConnLimits = kDefaultLimits): ConnReader {
  const buf = newDynBuf();

  // false once the peer has closed
  const fill = async (): Promise<boolean> => {
    const data = await readWithDeadline(conn, limits.readTimeoutMs);
    if (data.length === 0) return false;
    bufPush(buf, data);
    return true;
  };

  return {
    readline: async (): Promise<Buffer> => {
      while (true) {
        const line = cutLine(buf);
        if (line) {
          if (line.length > limits.maxLineLength) throw new HTTPError("HeaderTooLarge", "line too long");
          return line;
        }
        if (buf.length > limits.maxLineLength) throw new HTTPError("HeaderTooLarge", "line too long");
        if (!(await fill())) {
          // whatever is left is the last, unterminated line
          return bufTake(buf, buf.length);
        }
      }
    },
    readexactly: async (n: number): Promise<Buffer> => {
      while (buf.length < n) {
        if (!(await fill())) throw new HTTPError("UnexpectedEOF", `expected ${n} bytes, got ${buf.length}`);
      }
      return bufTake(buf, n);
    },
  };
}

export function writerFromConn(conn: TCPConn): ConnWriter {
  return {
    awrite: async (data: string | Buffer): Promise<void> => {
      const chunk = typeof data === "string" ? Buffer.from(data) : data;
      if (chunk.length === 0) return;
      await soWrite(conn, chunk);
    },
    aclose: () => soEnd(conn),
    get closed(): boolean {
      return conn.closed;
    },
  };
}
