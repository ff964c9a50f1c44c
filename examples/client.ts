// Multi-Token Ledger Client -- Example
//
// Walks through one full cycle against a running server:
//   1. Health check (GET /health)
//   2. Owner creates an asset class with an initial supply (POST /assets)
//   3. Holder approves an operator (PUT /approvals)
//   4. Operator moves part of the holder's balance (POST /transfers)
//   5. Owner burns what is left (POST /burn)
//   6. A transfer that overdraws fails with InsufficientBalance
//   7. Committed notifications (GET /events)
//
// Usage:
//   OWNER=0x... tsx examples/client.ts
//
// Environment variables:
//   OWNER       (required) -- ledger.owner from the server's config
//   SERVER_URL  (optional) -- Ledger server URL (default: http://localhost:3000)

import { LedgerClient, LedgerRequestError } from '../src/sdk/index.js';

const SERVER_URL = process.env.SERVER_URL ?? 'http://localhost:3000';

function requireEnv(name: string, hint: string): string {
  const value = process.env[name];
  if (!value) {
    console.error(`ERROR: ${name} environment variable is required.`);
    console.error(hint);
    process.exit(1);
  }
  return value;
}

const OWNER = requireEnv('OWNER', 'Use the ledger.owner address from config/config.json.');
const HOLDER = '0x00000000000000000000000000000000000000a1';
const OPERATOR = '0x00000000000000000000000000000000000000b2';
const RECIPIENT = '0x00000000000000000000000000000000000000c3';

function log(step: string, message: string): void {
  console.log(`\n[${step}] ${message}`);
}

async function main(): Promise<void> {
  const owner = new LedgerClient({ baseUrl: SERVER_URL, caller: OWNER });
  const holder = owner.as(HOLDER);
  const operator = owner.as(OPERATOR);

  const health: unknown = await fetch(`${SERVER_URL}/health`).then((r) => r.json());
  log('1', `Server health: ${JSON.stringify(health)}`);

  const { id } = await owner.createAsset({
    initialHolder: HOLDER,
    initialSupply: '1000',
    label: 'gold',
  });
  log('2', `Created asset ${id}; holder balance ${(await owner.balanceOf(id, HOLDER)).balance}`);

  await holder.setApprovalForAll({ operator: OPERATOR, approved: true });
  log('3', `Operator approved: ${(await owner.isApprovedForAll(HOLDER, OPERATOR)).approved}`);

  await operator.transfer({ from: HOLDER, to: RECIPIENT, id, amount: '250' });
  log('4', `Recipient balance ${(await owner.balanceOf(id, RECIPIENT)).balance}`);

  await owner.burn({ owner: HOLDER, id, amount: '750' });
  log('5', `Holder balance after burn ${(await owner.balanceOf(id, HOLDER)).balance}`);

  try {
    await holder.transfer({ from: HOLDER, to: RECIPIENT, id, amount: '1' });
  } catch (error) {
    if (error instanceof LedgerRequestError) {
      log('6', `Rejected as expected: ${error.code} ${error.message}`);
    } else {
      throw error;
    }
  }

  const { events, lastSequence } = await owner.events();
  log('7', `${events.length} events, last sequence ${lastSequence}`);
  for (const entry of events) {
    console.log(`  #${entry.sequence} ${JSON.stringify(entry.event)}`);
  }
}

main().catch((err) => {
  console.error('Example failed:', err);
  process.exit(1);
});
