import { resolveServerConfig } from "./config";
import { createDemoApp } from "./demo_app";

async function main(): Promise<void> {
  const config = resolveServerConfig();
  const app = createDemoApp();
  await app.run(config);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
