#!/usr/bin/env node
/**
 * @capvault/demo — Interactive CLI walkthrough.
 *
 * Runs a full vault session in your terminal:
 * boot -> quote -> deposit (direct, swap, fee-on-transfer, native) ->
 * cap refusal -> withdraw -> admin -> rescue -> verify event chain
 *
 * Uses the domain packages directly on the bundled market (no HTTP server).
 */

import chalk from "chalk";
import { formatAmount, parseAmount } from "@capvault/ledger";
import { VAULT_EVENTS } from "@capvault/event-store";
import { Vault } from "@capvault/vault";
import { buildMarket, loadMarketFile } from "@capvault/node";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 600;
const VAULT = "vault";
const ADMIN = "admin";
const USDC_DECIMALS = 6;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function usdc(amount: bigint): string {
  return `${formatAmount(amount, USDC_DECIMALS)} USDC`;
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                     CAPVAULT DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("        Swap-and-credit custody under a bank cap          ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(2, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function hashLine(label: string, hash: string): void {
  const short = hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.yellow(short));
}

function refused(err: unknown): void {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    console.log(chalk.red("    ✗ ") + chalk.red.bold(err.code) + chalk.gray(`  ${err.message}`));
    return;
  }
  throw err;
}

const TOTAL_STEPS = 11;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  Walk-through of a vault session on the bundled market."));
  console.log(chalk.gray("  Every step uses real domain packages — no mocks.\n"));
  await sleep(DELAY_MS);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const marketFile = loadMarketFile(new URL("../../node/market.json", import.meta.url));
  const market = await buildMarket(marketFile);
  ok(`Market loaded (${String(marketFile.assets.length)} assets, ${String(marketFile.pools.length)} pools)`);

  const vault = new Vault(
    {
      vaultAddress: VAULT,
      referenceAsset: "usdc",
      bankCap: parseAmount("10000", 8),
      admins: [ADMIN],
    },
    { book: market.book, factory: market.factory, wrapper: market.wrapper },
  );
  info("reference", "usdc (6 decimals)");
  info("bank cap", "10,000.00000000 cap units");
  ok("Vault initialized (admin: admin)");

  await sleep(DELAY_MS);

  // ─── Step 2: Quote ──────────────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Quote a Deposit");

  const daiIn = parseAmount("1000", 18);
  const quote = await vault.quoteDeposit("dai", daiIn);
  info("input", "1,000 DAI");
  info("path", quote.path);
  info("estimate", usdc(quote.referenceOut));
  info("price impact", `${String(quote.priceImpactBps)} bps`);
  ok(`Fits under cap: ${chalk.bold(String(quote.fitsUnderCap))}`);

  await sleep(DELAY_MS);

  // ─── Step 3: Direct Credit ──────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Deposit the Reference Asset");

  const direct = await vault.depositToken({
    user: "alice",
    assetIn: "usdc",
    amountIn: parseAmount("2500", USDC_DECIMALS),
    minAmountOut: 0n,
  });
  info("user", direct.user);
  info("path", direct.path);
  info("credited", usdc(direct.referenceCredited));
  ok(`${direct.depositId}: no pool touched`);

  await sleep(DELAY_MS);

  // ─── Step 4: Swap Then Credit ───────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Deposit Through a Pool");

  const minOut = (quote.referenceOut * 99n) / 100n;
  const swapped = await vault.depositToken({
    user: "bob",
    assetIn: "dai",
    amountIn: daiIn,
    minAmountOut: minOut,
  });
  info("input", "1,000 DAI");
  info("min out", usdc(minOut));
  info("credited", usdc(swapped.referenceCredited));
  ok(`${swapped.depositId}: swapped on pool:dai-usdc`);

  await sleep(DELAY_MS);

  // ─── Step 5: Fee-on-Transfer ────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Deposit a Fee-on-Transfer Asset");

  const feeIn = parseAmount("500", 18);
  const feeDeposit = await vault.depositToken({
    user: "bob",
    assetIn: "sfee",
    amountIn: feeIn,
    minAmountOut: 0n,
  });
  info("sent", `${formatAmount(feeIn, 18)} SFEE`);
  info("received", `${formatAmount(feeDeposit.amountReceived, 18)} SFEE (2% skimmed)`);
  info("credited", usdc(feeDeposit.referenceCredited));
  ok("Credit follows what the vault measured, not what was sent");

  await sleep(DELAY_MS);

  // ─── Step 6: Native ─────────────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Deposit Native Currency");

  const native = await vault.depositNative({
    user: "alice",
    amount: parseAmount("1", 18),
    minAmountOut: 0n,
  });
  info("wrapped", "1 ETH -> 1 WETH");
  info("credited", usdc(native.referenceCredited));
  ok(`${native.depositId}: wrapped, swapped and credited`);

  await sleep(DELAY_MS);

  // ─── Step 7: Cap ────────────────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Hit the Bank Cap");

  info("headroom", usdc(vault.capHeadroom()));
  const oversized = parseAmount("7500", USDC_DECIMALS);
  info("attempt", usdc(oversized));
  try {
    await vault.depositToken({ user: "alice", assetIn: "usdc", amountIn: oversized, minAmountOut: 0n });
  } catch (err) {
    refused(err);
  }
  const stranded = vault.events
    .readAll()
    .filter((e) => e.event.type === VAULT_EVENTS.DEPOSIT_STRANDED);
  ok(`Ledger unchanged; ${String(stranded.length)} stranded deposit recorded`);

  await sleep(DELAY_MS);

  // ─── Step 8: Withdraw ───────────────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "Withdraw");

  const withdrawal = await vault.withdraw("alice", parseAmount("1000", USDC_DECIMALS));
  info("user", withdrawal.user);
  info("amount", usdc(withdrawal.amount));
  info("balance after", usdc(withdrawal.balanceAfter));
  ok(`${withdrawal.withdrawalId}: debited before transfer`);

  await sleep(DELAY_MS);

  // ─── Step 9: Admin ──────────────────────────────────────────────────

  stepHeader(9, TOTAL_STEPS, "Administer");

  const change = vault.setBankCap(ADMIN, parseAmount("50000", 8));
  info("cap before", `${formatAmount(change.previous, 8)} cap units`);
  info("cap after", `${formatAmount(change.current, 8)} cap units`);
  vault.pause(ADMIN);
  ok("Vault paused");
  try {
    await vault.withdraw("bob", 1n);
  } catch (err) {
    refused(err);
  }
  try {
    vault.setBankCap("mallory", 0n);
  } catch (err) {
    refused(err);
  }
  vault.unpause(ADMIN);
  ok("Vault resumed");

  await sleep(DELAY_MS);

  // ─── Step 10: Rescue ────────────────────────────────────────────────

  stepHeader(10, TOTAL_STEPS, "Rescue the Stranded Deposit");

  const surplus = await vault.surplus();
  info("surplus", usdc(surplus));
  const rescued = await vault.rescue(ADMIN, "usdc", "alice", surplus);
  info("returned to", rescued.to);
  ok(`Surplus now ${usdc(await vault.surplus())}`);

  await sleep(DELAY_MS);

  // ─── Step 11: Verify ────────────────────────────────────────────────

  stepHeader(11, TOTAL_STEPS, "Verify the Event Chain");

  const events = vault.events.readAll();
  for (const se of events) {
    console.log(chalk.gray("    ") + chalk.dim(`${String(se.globalPosition).padStart(2)} ${se.event.type}`));
  }
  const last = events[events.length - 1];
  if (last !== undefined) {
    hashLine("head", last.hash);
  }
  const integrity = vault.events.verifyIntegrity();
  if (integrity.valid) {
    ok(`Hash chain intact (${String(integrity.lastVerifiedPosition)} events)`);
  } else {
    console.log(chalk.red(`    ✗ ${String(integrity.errors.length)} integrity errors`));
  }

  // ─── Summary ────────────────────────────────────────────────────────

  const totals = vault.totals();
  console.log();
  console.log(chalk.white("    Owed to users:       ") + chalk.cyan.bold(usdc(totals.totalHeld)));
  console.log(chalk.white("    Deposited (cap):     ") + chalk.cyan.bold(formatAmount(totals.totalDeposited, 8)));
  console.log(chalk.white("    Vault USDC:          ") + chalk.cyan.bold(usdc(await market.book.balanceOf("usdc", VAULT))));
  console.log(chalk.white("    Events recorded:     ") + chalk.cyan.bold(String(events.length)));
  console.log();
  console.log(chalk.gray("    Every credit is measured, capped and recorded."));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
