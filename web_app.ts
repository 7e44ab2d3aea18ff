import type { Server } from "net";
import type { DispatchTarget } from "./dispatcher";
import { HTTPError } from "./errors";
import type { HTTPRequest } from "./http_request";
import { serve } from "./http_server";
import { MountTable } from "./mount_table";
import { httpError, sendStream, startResponse, type ExtraHeaders } from "./response";
import { RouteTable } from "./route_table";
import { fsResourceLoader, getMimeType, type ResourceLoader } from "./static_files";
import { kDefaultLimits, type ConnLimits, type ConnWriter } from "./tcp_conn";
import type { Handler, HeadersMode, Matcher, RouteOptions, RouteSpec } from "./types";

export type Template = (...args: unknown[]) => Iterable<string>;

export interface TemplateLoader {
  load(name: string): Template;
}

export type WebAppOptions = {
  // identity used to find bundled resources
  pkg?: string | null;
  routes?: readonly RouteSpec[];
  // append the /static/ route (default true)
  serveStatic?: boolean;
  headersMode?: HeadersMode;
  resources?: ResourceLoader;
  templates?: TemplateLoader;
  limits?: Partial<ConnLimits>;
  // log each new connection
  debug?: boolean;
};

export type RunOptions = {
  host?: string;
  port?: number;
  // init mounted apps on their first request instead of at startup
  lazyInit?: boolean;
};

export const kStaticRoute = /^\/(static\/.+)/;

/**
 * An application: an ordered route table plus sub-applications mounted by
 * prefix. Routes and mounts can be registered until `init()`; after that
 * the tables are read-only.
 */
export class WebApp implements DispatchTarget {
  readonly routes: RouteTable;
  readonly mounts = new MountTable<WebApp>();
  readonly pkg: string | null;
  readonly headersMode: HeadersMode;
  readonly limits: ConnLimits;
  readonly debug: boolean;
  // prefix this app is mounted at, if any
  url: string | null = null;

  private readonly resources: ResourceLoader;
  private readonly templates: TemplateLoader | null;
  private initState: "configuring" | "ready" = "configuring";

  constructor(options: WebAppOptions = {}) {
    this.routes = new RouteTable(options.routes);
    this.pkg = options.pkg ?? null;
    this.headersMode = options.headersMode ?? "parse";
    this.limits = { ...kDefaultLimits, ...options.limits };
    this.debug = options.debug ?? false;
    this.resources = options.resources ?? fsResourceLoader(process.cwd());
    this.templates = options.templates ?? null;
    if (options.serveStatic ?? true) {
      this.routes.add(kStaticRoute, (req, writer) => this.handleStatic(req, writer));
    }
  }

  get inited(): boolean {
    return this.initState === "ready";
  }

  // freezes the tables and runs setup(); true only on the first call
  init(): boolean {
    if (this.initState === "ready") return false;
    this.initState = "ready";
    this.setup();
    return true;
  }

  // one-time setup hook for subclasses
  protected setup(): void {}

  // called once per failed request
  handleExc(_req: HTTPRequest | null, _writer: ConnWriter, _err: unknown): Promise<void> | void {}

  private assertConfiguring(what: string): void {
    if (this.initState !== "configuring") {
      throw new Error(`cannot ${what} after init()`);
    }
  }

  addUrlRule(url: Matcher, handler: Handler, options: RouteOptions = {}): void {
    this.assertConfiguring("add a route");
    this.routes.add(url, handler, options);
  }

  // app.route("/hello")(async (req, w) => { ... });
  route(url: Matcher, options: RouteOptions = {}): <H extends Handler>(handler: H) => H {
    return (handler) => {
      this.addUrlRule(url, handler, options);
      return handler;
    };
  }

  mount(url: string, app: WebApp): void {
    this.assertConfiguring("mount");
    if (app === this) throw new Error("cannot mount an app on itself");
    this.mounts.add(url, app);
    app.url = url;
  }

  /* ==================== RESOURCES ==================== */

  async sendfile(writer: ConnWriter, fname: string, contentType?: string, headers?: ExtraHeaders): Promise<void> {
    const stream = await this.resources.open(this.pkg, fname);
    if (!stream) {
      await httpError(writer, "404");
      return;
    }
    await startResponse(writer, contentType ?? getMimeType(fname), "200", headers);
    await sendStream(writer, stream);
  }

  // ".." anywhere in the path is refused, not just as a path segment
  async handleStatic(req: HTTPRequest, writer: ConnWriter): Promise<void> {
    const path = req.urlMatch?.[1];
    if (path === undefined) {
      await httpError(writer, "404");
      return;
    }
    if (path.includes("..")) {
      await httpError(writer, "403");
      return;
    }
    await this.sendfile(writer, path);
  }

  private loadTemplate(name: string): Template {
    if (!this.templates) throw new HTTPError("ResourceIOError", `no template loader for ${name}`);
    return this.templates.load(name);
  }

  async renderTemplate(writer: ConnWriter, name: string, args: readonly unknown[] = []): Promise<void> {
    for (const s of this.loadTemplate(name)(...args)) {
      await writer.awrite(s);
    }
  }

  renderStr(name: string, args: readonly unknown[] = []): string {
    return [...this.loadTemplate(name)(...args)].join("");
  }

  /* ==================== SERVING ==================== */

  serve(host: string, port: number): Promise<Server> {
    return serve(this, host, port);
  }

  run(options: RunOptions = {}): Promise<Server> {
    this.init();
    if (!options.lazyInit) {
      for (const app of this.mounts.targets()) app.init();
    }
    return this.serve(options.host ?? "0.0.0.0", options.port ?? 80);
  }
}
