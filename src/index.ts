#!/usr/bin/env node
import { main } from "./adapters/cli/main";

async function bootstrap() {
  process.exitCode = await main();
}

bootstrap().catch((err) => {
  console.error("Error fatal:", err);
  process.exit(1);
});
