import { jsonify, startResponse } from "./response";
import { queryValueToPlain } from "./query_string";
import type { ResourceLoader } from "./static_files";
import { WebApp } from "./web_app";

// small application used by main.ts
export function createDemoApp(resources?: ResourceLoader): WebApp {
  const app = new WebApp({ pkg: "public", resources });

  app.route("/")(async (_req, w) => {
    await startResponse(w);
    await w.awrite("<h1>it works</h1>\n");
  });

  app.route("/echo")(async (req, w) => {
    const form = req.parseQs();
    const out: Record<string, string | true | string[]> = {};
    for (const [k, v] of Object.entries(form)) out[k] = queryValueToPlain(v);
    await jsonify(w, out);
  });

  app.route("/form")(async (req, w) => {
    if (req.method !== "POST") {
      await startResponse(w, "text/plain", "405");
      await w.awrite("POST only\n");
      return;
    }
    const form = await req.readFormData();
    await startResponse(w, "text/plain");
    await w.awrite(`fields: ${Object.keys(form).sort().join(",")}\n`);
  });

  const api = new WebApp({ serveStatic: false });
  api.route(/^\/items\/(?<id>\d+)$/)(async (req, w) => {
    await jsonify(w, { id: req.urlMatch?.groups?.["id"] ?? null });
  });
  app.mount("/api", api);

  return app;
}
