import type { Fiscus, TransactionType, TransferResult } from "fiscus";

/**
 * Assert that an account has the expected balance.
 */
export async function assertAccountBalance(
	fiscus: Fiscus,
	accountId: string,
	expectedBalance: number,
): Promise<void> {
	const account = await fiscus.accounts.get(accountId);
	if (account.balance !== expectedBalance) {
		throw new Error(
			`Account ${accountId}: expected balance ${expectedBalance}, got ${account.balance}`,
		);
	}
}

/**
 * Assert the balance equals the net of the account's ledger records, where
 * deposits, incoming transfers and interest credit and everything else debits.
 * Not valid for accounts charged a fee larger than their balance.
 */
export async function assertLedgerMatchesBalance(fiscus: Fiscus, accountId: string): Promise<void> {
	const account = await fiscus.accounts.get(accountId);
	const { transactions } = await fiscus.transactions.list({ accountId, limit: 200 });

	const credits: ReadonlySet<TransactionType> = new Set(["DEPOSIT", "TRANSFER_IN", "INTEREST"]);
	const net = transactions.reduce(
		(sum, t) => (credits.has(t.type) ? sum + t.amount : sum - t.amount),
		0,
	);
	if (net !== account.balance) {
		throw new Error(`Account ${accountId}: ledger nets to ${net}, balance is ${account.balance}`);
	}
}

/**
 * Assert that the sum of the given accounts' balances equals `expectedTotal`.
 * Transfers conserve this total.
 */
export async function assertTotalBalance(
	fiscus: Fiscus,
	accountIds: string[],
	expectedTotal: number,
): Promise<void> {
	const accounts = await Promise.all(accountIds.map((id) => fiscus.accounts.get(id)));
	const total = accounts.reduce((sum, a) => sum + a.balance, 0);
	if (total !== expectedTotal) {
		throw new Error(`Expected total balance ${expectedTotal}, got ${total}`);
	}
}

/**
 * Assert that a transfer produced a mirrored TRANSFER_OUT / TRANSFER_IN pair.
 */
export function assertTransferPair(result: TransferResult): void {
	const { outgoing, incoming } = result;
	const mirrored =
		outgoing.type === "TRANSFER_OUT" &&
		incoming.type === "TRANSFER_IN" &&
		outgoing.amount === incoming.amount &&
		outgoing.counterpartyAccountId === incoming.accountId &&
		incoming.counterpartyAccountId === outgoing.accountId;
	if (!mirrored) {
		throw new Error(
			`Transfer records are not mirrored: ${outgoing.id} (${outgoing.type}) / ${incoming.id} (${incoming.type})`,
		);
	}
}
