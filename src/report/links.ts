/**
 * Public URLs for a market page and an on-chain transaction
 */

export const MARKET_PAGE_BASE_URL = "https://polymarket.com/event";
export const EXPLORER_TX_BASE_URL = "https://polygonscan.com/tx";

export function marketUrl(slug: string | null): string | null {
  return slug ? `${MARKET_PAGE_BASE_URL}/${encodeURIComponent(slug)}` : null;
}

export function transactionUrl(txHash: string): string {
  return `${EXPLORER_TX_BASE_URL}/${txHash}`;
}
