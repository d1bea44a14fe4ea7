import "dotenv/config";
import { handler } from "../functions/poller/index";
import { closePool } from "../src/clients/db";

async function main() {
  const res = await handler();
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(res));
  await closePool();
}

main().catch((e) => {
  // eslint-disable-next-line no-console
  console.error(e);
  process.exit(1);
});
