/**
 * Prints a few sample Cloud Logging documents to stdout.
 *
 * Usage:
 *   npm run demo
 *   GOOGLE_CLOUD_PROJECT=demo npm run demo      (adds trace correlation fields)
 *   LOG_FORMAT=pretty npm run demo              (human-readable output)
 */

import {
  createLogger,
  globalSinkRegistry,
  httpRequestFields,
  inScope,
  recordInScope,
} from "../src/lib/observability";

const log = createLogger("demo");

async function demoLogging() {
  log.info("Plain event");

  log.info("Labelled event", {
    "labels.tenant": "acme",
    "labels.retries": 3,
    insert_id: "demo-1",
  });

  await inScope("handle_request", { request_id: "req-42" }, async () => {
    recordInScope({ user_id: 7 });

    await inScope("load_order", { order_id: "ord-9" }, async () => {
      log.debug("Order loaded", { item_count: 2 });
    });

    log.info("Request served", {
      ...httpRequestFields({ requestMethod: "GET", requestUrl: "/orders/ord-9", status: 200, latencyMs: 231 }),
    });
  });

  log.warn("Quota nearly used", { severity: "NOTICE", "quota.used_pct": 91 });
  log.error("Payment failed", new Error("card declined"), { order_id: "ord-9" });

  await globalSinkRegistry.flush();
}

demoLogging().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
