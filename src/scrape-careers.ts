import "dotenv/config";
import { runCli } from "./cli";

async function main() {
  process.exitCode = await runCli(process.argv.slice(2), process.env);
}

main().catch((error) => {
  console.error("\n✗ Error:", error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
