import { open as openFile, type FileHandle } from "fs/promises";
import * as path from "path";
import type { Readable } from "stream";
import { HTTPError } from "./errors";

export function getMimeType(fname: string): string {
  if (fname.endsWith(".html")) return "text/html";
  if (fname.endsWith(".css")) return "text/css";
  if (fname.endsWith(".png") || fname.endsWith(".jpg")) return "image";
  return "text/plain";
}

/**
 * Looks up resources bundled with an application. `pkg` is the
 * application's identity (null for none); `null` means not found.
 */
export interface ResourceLoader {
  open(pkg: string | null, relPath: string): Promise<Readable | null>;
}

function errnoOf(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function fsResourceLoader(baseDir: string): ResourceLoader {
  return {
    async open(pkg, relPath) {
      const file = path.join(baseDir, pkg ?? "", relPath);
      let handle: FileHandle;
      try {
        handle = await openFile(file, "r");
      } catch (err) {
        const code = errnoOf(err);
        if (code === "ENOENT" || code === "ENOTDIR") return null;
        throw new HTTPError("ResourceIOError", `cannot open ${relPath}`, { cause: err });
      }
      return handle.createReadStream();
    },
  };
}
