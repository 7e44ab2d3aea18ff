export type ServerConfig = {
  host: string;
  port: number;
  lazyInit: boolean;
};

export const kDefaultHost = "127.0.0.1";
export const kDefaultPort = 1234;

export function resolveServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const rawPort = env["PORT"];
  const port = rawPort === undefined || rawPort === "" ? kDefaultPort : Number(rawPort);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`invalid PORT: ${rawPort}`);
  }
  const lazy = (env["LAZY_INIT"] ?? "").toLowerCase();
  return {
    host: env["HOST"] || kDefaultHost,
    port,
    lazyInit: lazy === "1" || lazy === "true",
  };
}
