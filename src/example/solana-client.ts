import { createSolanaRpc } from "@solana/rpc";
import type { EndpointStatus } from "../sdk/types.js";

const GATEWAY_URL = process.env.GATEWAY_URL ?? "http://127.0.0.1:8080";

interface StatusBody {
  routes: Array<{ routeId: string; endpoints: EndpointStatus[] }>;
}

function isStatusBody(value: unknown): value is StatusBody {
  return typeof value === "object" && value !== null && "routes" in value && Array.isArray(value.routes);
}

async function readSlots(): Promise<void> {
  const rpc = createSolanaRpc(GATEWAY_URL);

  const slot = await rpc.getSlot().send();
  const processed = await rpc.getSlot({ commitment: "processed" }).send();
  const blockHeight = await rpc.getBlockHeight().send();
  console.log(`slot (confirmed)  ${slot}`);
  console.log(`slot (processed)  ${processed}`);
  console.log(`block height      ${blockHeight}`);

  // Each call is its own round; the gateway races all active upstreams.
  const slots = await Promise.all(Array.from({ length: 5 }, () => rpc.getSlot().send()));
  console.log(`5 parallel rounds ${slots.join(", ")}`);
}

async function readBatch(): Promise<void> {
  const response = await fetch(GATEWAY_URL, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify([
      { jsonrpc: "2.0", id: 1, method: "getSlot" },
      { jsonrpc: "2.0", id: 2, method: "getBlockHeight" },
    ]),
  });
  console.log(`batch             ${response.status} ${await response.text()}`);
}

async function printEndpoints(): Promise<void> {
  const response = await fetch(new URL("/status", GATEWAY_URL));
  const body: unknown = await response.json();
  if (!isStatusBody(body)) {
    throw new Error(`Unexpected /status body: ${JSON.stringify(body)}`);
  }

  for (const route of body.routes) {
    console.log(`\nroute ${route.routeId}`);
    for (const endpoint of route.endpoints) {
      const until = endpoint.quarantinedUntil
        ? ` until ${new Date(endpoint.quarantinedUntil).toISOString()}`
        : "";
      console.log(
        `  ${endpoint.state.padEnd(11)} ${endpoint.url} slot=${endpoint.lastKnownSlot ?? "-"} lag=${endpoint.consecutiveLagCount}${until}`,
      );
    }
  }
}

async function main(): Promise<void> {
  console.log(`Gateway: ${GATEWAY_URL}\n`);
  await readSlots();
  await readBatch();
  await printEndpoints();
}

main().catch((error) => {
  console.error(error);
  console.error("\nIs the gateway running? npm run build && npm start -- 8080 <URL1> <URL2>");
  process.exit(1);
});
