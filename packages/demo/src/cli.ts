/**
 * Demo CLI
 *
 *   cli [--scenario <name>] [--events <file.jsonl>] [--db <file.db>] [--json]
 *   cli --list
 *   cli serve [--port 7788] [--no-seed]
 *
 * `serve` starts the oracle callback gateway in front of a demo system whose
 * trusted signer is the identity loaded by loadOracleKeypair. Unless --no-seed
 * is given, it first runs an auction up to finalize and prints the oracle's
 * signed answer as a curl command, so /requests/pending lists one request
 * and the callback can be posted by hand. The system runs on the demo's
 * manual clock, which stays where seeding left it; timeouts never open.
 */

import minimist from "minimist";
import {
  createJsonlEventSink,
  describeError,
  loadConfigFromEnv,
  log,
  MockConfidentialOracle,
  serializeEvent,
} from "@cipherlicense/core";
import { createTestHarness } from "@cipherlicense/core/testkit";
import { loadOracleKeypair, startCallbackServer } from "@cipherlicense/oracle-bridge";
import { isScenarioName, runScenario, SCENARIO_NAMES, seedPendingAuction } from "./scenarios";

function printSection(title: string): void {
  console.log(`\n${"═".repeat(60)}`);
  console.log(`  ${title}`);
  console.log(`${"═".repeat(60)}`);
}

async function serve(port: number, seed: boolean): Promise<void> {
  const { keypair, publicKeyB58, mode, warning } = loadOracleKeypair();
  const config = loadConfigFromEnv();
  const h = createTestHarness({
    oracle: new MockConfidentialOracle({ keypair }),
    config: { ...config, oracle_signers: [...config.oracle_signers, publicKeyB58] },
    log,
    startMs: Date.now(),
  });
  const { system } = h;
  const seeded = seed ? seedPendingAuction(h) : undefined;
  const server = await startCallbackServer({ system, port });

  console.log(`[Callback Gateway] Oracle signer: ${publicKeyB58}`);
  console.log(`[Callback Gateway] Identity mode: ${mode}`);
  if (warning) console.log(`[Callback Gateway] ${warning}`);
  console.log(`[Callback Gateway] Started on ${server.url}`);
  if (seeded) {
    console.log(`[Callback Gateway] Request ${seeded.request_id} pending for patent ${seeded.asset_id}. Settle it with:`);
    console.log(
      `  curl -X POST ${server.url}${seeded.path} -H 'Content-Type: application/json' -d '${JSON.stringify(seeded.body)}'`
    );
  }
  console.log(`[Callback Gateway] Press Ctrl+C to stop`);

  process.once("SIGINT", () => {
    server
      .close()
      .then(() => system.close())
      .catch((error: unknown) => console.error("Error:", describeError(error)));
  });
}

async function main(): Promise<void> {
  const raw = process.argv.slice(2).filter((x) => x !== "--");
  const args = minimist(raw, {
    string: ["scenario", "events", "db"],
    boolean: ["list", "json", "seed"],
    alias: { s: "scenario", p: "port" },
    default: { scenario: "workflow", port: 7788, seed: true },
  });

  if (args.list) {
    for (const name of SCENARIO_NAMES) console.log(name);
    return;
  }

  if (args._[0] === "serve") {
    const port = Number(args.port);
    if (!Number.isInteger(port) || port < 0) {
      throw new Error(`Invalid --port: ${String(args.port)}`);
    }
    await serve(port, Boolean(args.seed));
    return;
  }

  const scenario = String(args.scenario);
  if (!isScenarioName(scenario)) {
    console.error(`Unknown scenario "${scenario}". Available: ${SCENARIO_NAMES.join(", ")}`);
    process.exitCode = 1;
    return;
  }

  const dbPath = typeof args.db === "string" && args.db !== "" ? args.db : undefined;
  const eventsPath = typeof args.events === "string" && args.events !== "" ? args.events : undefined;

  if (!args.json) printSection(`CipherLicense demo: ${scenario}`);
  const report = runScenario(scenario, {
    print: args.json ? () => {} : (line) => console.log(line),
    config: dbPath ? { store: { mode: "sqlite", db_path: dbPath } } : undefined,
    onEvent: eventsPath ? createJsonlEventSink(eventsPath) : undefined,
  });

  if (args.json) {
    console.log(JSON.stringify(report, (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value), 2));
    return;
  }

  printSection("Events");
  for (const event of report.events) console.log(serializeEvent(event));

  printSection("Summary");
  console.log(`- Patents registered: ${report.patents}`);
  console.log(`- Licenses requested: ${report.licenses}`);
  console.log(`- Royalty payments: ${report.royalty_payments}`);
  console.log(`- Confidential bids: ${report.bids}`);
  for (const [account, balance] of Object.entries(report.balances)) {
    console.log(`  ${account.padEnd(10)} ${balance}`);
  }
  if (!report.audit.balanced) process.exitCode = 1;
}

main().catch((err: unknown) => {
  console.error("Error:", describeError(err));
  process.exit(1);
});
