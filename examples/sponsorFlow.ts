/**
 * Sponsorship Flow Example
 *
 * Walks one beneficiary through the full lifecycle against in-memory
 * collaborators:
 * - a sponsor credits two assets (one of them charges a transfer fee)
 * - a second sponsor is turned away while the beneficiary is locked
 * - the consuming engine draws down one asset
 * - the beneficiary forfeits the rest and is released
 *
 * Usage:
 *   npx tsx examples/sponsorFlow.ts
 */

import {
  createLedgerModule,
  formatAccount,
  InMemoryAssetSink,
  InMemoryEligibilityRegistry,
  type Address,
} from "@sponsor-ledger/core";

const admin: Address = "0x1000000000000000000000000000000000000001";
const engine: Address = "0x2000000000000000000000000000000000000002";
const sponsor: Address = "0x3000000000000000000000000000000000000003";
const rival: Address = "0x3000000000000000000000000000000000000033";
const beneficiary: Address = "0x4000000000000000000000000000000000000004";
const credits: Address = "0x5000000000000000000000000000000000000005";
const feeToken: Address = "0x5000000000000000000000000000000000000055";

const registry = new InMemoryEligibilityRegistry();
registry.list(credits, { decimals: 6, capUnits: 1_000_000n });
registry.list(feeToken, { decimals: 18 });

const sink = new InMemoryAssetSink("0x000000000000000000000000000000000000dEaD");
sink.setTransferFeeBps(feeToken, 200n);
for (const holder of [sponsor, rival]) {
  sink.fund(holder, credits, 10_000n);
  sink.fund(holder, feeToken, 10_000n);
}

const { ledger, audit, verify } = createLedgerModule({ registry, sink, owner: admin });

async function main() {
  await ledger.setConsumingEngine(admin, engine);

  const first = await ledger.sponsor(sponsor, { beneficiary, asset: credits, amount: 500n });
  const second = await ledger.sponsor(sponsor, { beneficiary, asset: feeToken, amount: 1_000n });
  if (second.success) {
    console.log(`Fee token: requested ${second.requested}, credited ${second.received}`);
  }
  console.log("Sponsored:", first.success && second.success);

  const rivalAttempt = await ledger.sponsor(rival, { beneficiary, asset: credits, amount: 1n });
  if (!rivalAttempt.success) {
    console.log(`Rival sponsor refused: ${rivalAttempt.error}`);
  }

  const consumed = await ledger.consume(engine, { beneficiary, asset: credits, amount: 500n });
  if (consumed.success) {
    console.log(`Consumed ${consumed.amount}, remaining ${consumed.remaining}`);
  }

  const forfeit = await ledger.clearSponsorAndForfeitAll(beneficiary);
  if (forfeit.success) {
    console.log(
      `Forfeited ${forfeit.totalForfeited} across ${forfeit.assetsCleared} asset(s); sponsor cleared: ${forfeit.sponsorCleared}`
    );
  }

  const account = ledger.getAccount(beneficiary);
  if (account) {
    console.log("Account:", formatAccount(account));
  }
  console.log("Audit trail:", audit.list().map((r) => `${r.sequence}:${r.type}`).reverse());
  console.log("Invariant violations:", verify());
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
