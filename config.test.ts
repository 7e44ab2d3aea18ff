import { describe, it, expect } from "vitest";
import { kDefaultHost, kDefaultPort, resolveServerConfig } from "./config";

describe("resolveServerConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(resolveServerConfig({})).toEqual({ host: kDefaultHost, port: kDefaultPort, lazyInit: false });
  });

  it("reads HOST, PORT and LAZY_INIT", () => {
    expect(resolveServerConfig({ HOST: "0.0.0.0", PORT: "8080", LAZY_INIT: "TRUE" })).toEqual({
      host: "0.0.0.0",
      port: 8080,
      lazyInit: true,
    });
    expect(resolveServerConfig({ LAZY_INIT: "1" }).lazyInit).toBe(true);
    expect(resolveServerConfig({ LAZY_INIT: "no" }).lazyInit).toBe(false);
  });

  it("rejects a port that is not a valid number", () => {
    expect(() => resolveServerConfig({ PORT: "http" })).toThrow("invalid PORT: http");
    expect(() => resolveServerConfig({ PORT: "70000" })).toThrow("invalid PORT: 70000");
  });
});
