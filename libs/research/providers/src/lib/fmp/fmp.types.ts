/**
 * Subset of the Financial Modeling Prep v3 payloads the provider reads
 */

export interface FmpQuote {
  symbol: string;
  price?: number | null;
  pe?: number | null;
  eps?: number | null;
  marketCap?: number | null;
}

export interface FmpIncomeStatement {
  date: string;
  symbol: string;
  period?: string;
  revenue?: number | null;
  netIncome?: number | null;
}
