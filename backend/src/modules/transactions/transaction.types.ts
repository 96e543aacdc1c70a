/**
 * A ledger is the tenant-owned partition of transactions (one per tenant service).
 */
export type LedgerKey = string;

export type Transaction = {
  transactionId: number;
  ledger: LedgerKey;
  amount: number;
  /** ISO date, YYYY-MM-DD */
  date: string;
};
