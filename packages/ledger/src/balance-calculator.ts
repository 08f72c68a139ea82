/**
 * @pocketbook/ledger — Balance calculation engine.
 *
 * Computes account balances and the trial balance from posting totals.
 * All calculations are deterministic using bigint arithmetic.
 *
 * Rules:
 * - Normal balance rules determine sign conventions
 * - Asset, Expense: opening + debits − credits
 * - Liability, Equity, Income: opening + credits − debits
 * - Trial balance must always balance (debits = credits)
 */

import type { Account, AccountCategory, AccountId, Amount } from "@pocketbook/types";
import { formatAmount, parseAmount } from "./money-math.js";
import type {
  AccountBalance,
  FinancialOverview,
  PostingTotals,
  TrialBalance,
  TrialBalanceLine,
} from "./types.js";
import { NORMAL_BALANCE } from "./types.js";

/**
 * Net movement of an account in its normal direction.
 */
export function normalMovement(
  category: AccountCategory,
  totals: PostingTotals,
  decimals: number,
): Amount {
  const debits = parseAmount(totals.debits, decimals);
  const credits = parseAmount(totals.credits, decimals);
  const net = NORMAL_BALANCE[category] === "debit" ? debits - credits : credits - debits;
  return formatAmount(net, decimals);
}

/**
 * Compute the balance of a single account, opening balance included.
 */
export function computeAccountBalance(
  account: Account,
  totals: PostingTotals,
  decimals: number,
): AccountBalance {
  const movement = parseAmount(normalMovement(account.category, totals, decimals), decimals);
  const balance = parseAmount(account.openingBalance, decimals) + movement;

  return {
    accountId: account.id,
    name: account.name,
    category: account.category,
    openingBalance: account.openingBalance,
    totalDebits: totals.debits,
    totalCredits: totals.credits,
    balance: formatAmount(balance, decimals),
  };
}

/**
 * Compute the trial balance from posting totals.
 *
 * For each account with postings:
 * - Debit-normal accounts: if net debit ≥ 0, show in debit column; else credit column
 * - Credit-normal accounts: if net credit ≥ 0, show in credit column; else debit column
 *
 * Every posting adds its amount to one debit and one credit, so
 * the columns always total the same.
 */
export function computeTrialBalance(
  accounts: readonly Account[],
  totalsByAccount: ReadonlyMap<AccountId, PostingTotals>,
  decimals: number,
): TrialBalance {
  const lines: TrialBalanceLine[] = [];
  let totalDebits = 0n;
  let totalCredits = 0n;

  for (const account of accounts) {
    const totals = totalsByAccount.get(account.id);
    if (totals === undefined) continue;

    const netDebit = parseAmount(totals.debits, decimals) - parseAmount(totals.credits, decimals);

    let debitBalance: bigint;
    let creditBalance: bigint;

    if (NORMAL_BALANCE[account.category] === "debit") {
      debitBalance = netDebit >= 0n ? netDebit : 0n;
      creditBalance = netDebit >= 0n ? 0n : -netDebit;
    } else {
      const netCredit = -netDebit;
      debitBalance = netCredit >= 0n ? 0n : -netCredit;
      creditBalance = netCredit >= 0n ? netCredit : 0n;
    }

    lines.push({
      accountId: account.id,
      name: account.name,
      category: account.category,
      debitBalance: formatAmount(debitBalance, decimals),
      creditBalance: formatAmount(creditBalance, decimals),
    });

    totalDebits += debitBalance;
    totalCredits += creditBalance;
  }

  return {
    lines,
    totalDebits: formatAmount(totalDebits, decimals),
    totalCredits: formatAmount(totalCredits, decimals),
    balanced: totalDebits === totalCredits,
  };
}

/**
 * Balance-sheet summary: asset and liability balances (openings
 * included) and their difference. Accounts without postings count
 * with their opening balance alone.
 */
export function computeFinancialOverview(
  accounts: readonly Account[],
  totalsByAccount: ReadonlyMap<AccountId, PostingTotals>,
  decimals: number,
): FinancialOverview {
  const none: PostingTotals = { debits: formatAmount(0n, decimals), credits: formatAmount(0n, decimals) };
  let assets = 0n;
  let liabilities = 0n;

  for (const account of accounts) {
    if (account.category !== "asset" && account.category !== "liability") continue;
    const { balance } = computeAccountBalance(account, totalsByAccount.get(account.id) ?? none, decimals);
    if (account.category === "asset") {
      assets += parseAmount(balance, decimals);
    } else {
      liabilities += parseAmount(balance, decimals);
    }
  }

  return {
    totalAssets: formatAmount(assets, decimals),
    totalLiabilities: formatAmount(liabilities, decimals),
    netWorth: formatAmount(assets - liabilities, decimals),
  };
}
