import * as net from "net";
import type { Duplex } from "stream";
import { dispatch, type DispatchTarget } from "./dispatcher";
import { readerFromConn, soInit, writerFromConn } from "./tcp_conn";

/* ==================== SERVER LOOP ==================== */

type ServedApp = DispatchTarget & { readonly debug: boolean };

// a net.Socket, or any duplex stream standing in for one
type ClientSocket = Duplex & { remoteAddress?: string; remotePort?: number };

export async function newConn(app: ServedApp, socket: ClientSocket): Promise<void> {
  if (app.debug) {
    console.log("new connection", socket.remoteAddress, socket.remotePort);
  }
  const conn = soInit(socket);
  const writer = writerFromConn(conn);
  try {
    const report = await dispatch(app, readerFromConn(conn, app.limits), writer);
    if (app.debug && report.errorKind) {
      console.log("request failed:", report.errorKind);
    }
  } catch (exc) {
    // the exception hook threw, or ending the socket failed
    console.error("exception:", exc);
    socket.destroy();
  } finally {
    // a handler that kept the connection open owns it from here
    if (writer.closed) socket.destroy();
  }
}

/* ==================== SERVER STARTUP ==================== */

// resolves once the server is listening
export function serve(app: ServedApp, host: string, port: number): Promise<net.Server> {
  const server = net.createServer({ pauseOnConnect: true });

  server.on("connection", (socket) => {
    newConn(app, socket).catch(console.error);
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen({ host, port }, () => {
      server.off("error", reject);
      server.on("error", (err) => console.error("Server error:", err));
      console.log(`Server listening on ${host}:${port}`);
      resolve(server);
    });
  });
}
