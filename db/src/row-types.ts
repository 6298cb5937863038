export interface AccountRow {
  account_id: number;
  name: string;
  account_type: string;
  created_at: number;
  updated_at: number;
}

export interface CategoryRow {
  category_id: number;
  name: string;
  category_type: string;
  created_at: number;
  updated_at: number;
}

export interface TransactionRow {
  transaction_id: number;
  account_id: number;
  category_id: number;
  amount: number; // cents
  transaction_date: string; // YYYY-MM-DD
  description: string | null;
  created_at: number;
  updated_at: number;
}

export interface TransactionSummaryRow {
  category_name: string;
  total_amount: number; // cents
  count: number;
}
