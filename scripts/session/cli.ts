#!/usr/bin/env node
/**
 * Sealed Market session CLI
 *
 * Usage:
 *   npx tsx scripts/session/cli.ts demo [--stale]
 *   npx tsx scripts/session/cli.ts commit <h1> <h2> <h3> <h4> --market <address>
 *   npx tsx scripts/session/cli.ts decode <cleartexts>
 */

import { Command } from "commander";
import { isHex, zeroHash } from "viem";
import {
  computeStateHash,
  createLogger,
  decodeCleartexts,
  loadConfig,
  SLOT_ORDER,
} from "../../core/src/index.js";
import { parseAddress, parseHandle } from "../../core/src/utils/validate.js";
import { DEMO_ACCOUNTS, formatEvent, runSession } from "./session.js";

const program = new Command();

program
  .name("sealed-market")
  .description("Drive a local sealed-market session and inspect its encodings")
  .version("0.1.0");

// ============ Demo Command ============

program
  .command("demo")
  .description("Run one batch through request and fulfillment with the local oracle")
  .option("--stale", "Overwrite the trade slots between request and fulfillment")
  .action(async (options: { stale?: boolean }) => {
    const config = loadConfig({ OWNER_ADDRESS: DEMO_ACCOUNTS.owner, ...process.env });
    const logger = createLogger(config.logLevel);

    const result = await runSession({ config, logger, stale: options.stale ?? false });

    console.log(`\nBatch ${result.batchId}, request ${result.requestId}\n`);
    for (const record of result.events) {
      console.log(`  ${formatEvent(record)}`);
    }
    console.log("");
    if (result.outcome.status === "completed") {
      for (const name of SLOT_ORDER) {
        console.log(`  ${name.padEnd(20)} ${result.outcome.values[name]}`);
      }
    } else {
      console.log(`  Rejected: ${result.outcome.code} (${result.outcome.message})`);
      process.exitCode = 1;
    }
  });

// ============ Commit Command ============

program
  .command("commit")
  .description("Compute the state hash over four slot handles (use 0x0 for unset)")
  .argument("<stockPrice>", "stockPrice handle")
  .argument("<playerBalance>", "playerBalance handle")
  .argument("<playerStockHolding>", "playerStockHolding handle")
  .argument("<newsImpact>", "newsImpact handle")
  .requiredOption("-m, --market <address>", "Market address bound into the commitment")
  .action((h1: string, h2: string, h3: string, h4: string, options: { market: string }) => {
    const handles = [h1, h2, h3, h4].map((h, i) =>
      isUnset(h) ? null : parseHandle(h, SLOT_ORDER[i])
    );
    const market = parseAddress(options.market, "market");
    console.log(computeStateHash(handles, market));
  });

// ============ Decode Command ============

program
  .command("decode")
  .description("Decode a cleartext buffer into the four slot values")
  .argument("<cleartexts>", "0x-prefixed cleartext bytes")
  .action((cleartexts: string) => {
    if (!isHex(cleartexts, { strict: true })) {
      throw new Error("cleartexts must be 0x-prefixed hex");
    }
    const values = decodeCleartexts(cleartexts);
    for (const name of SLOT_ORDER) {
      console.log(`${name.padEnd(20)} ${values[name]}`);
    }
  });

function isUnset(handle: string): boolean {
  return handle === "0x0" || handle === "0x" || handle === zeroHash;
}

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
