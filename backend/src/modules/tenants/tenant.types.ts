import type { Transaction } from '../transactions';

/** Opaque tenant identifier taken from the request (header or subdomain). */
export type TenantKey = string;

export type TenantProfile = {
  /** Display name the implementation is registered under (what tenant keys match). */
  tenant: string;
  ledger: string;
  currency: string;
  locale: string;
};

export type TenantTransaction = Transaction & {
  formattedAmount: string;
};
