export interface Transaction {
  id: number;
  userId: number;
  bookId: number;
  borrowDate: string;
  returnDate: string | null;
  isReturned: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface BorrowRequest {
  userId?: number;
  bookId: number;
  borrowDate?: string;
}

export interface UpdateTransactionRequest {
  borrowDate?: string;
  returnDate?: string | null;
  isReturned?: boolean;
}

export interface TransactionListParams {
  skip?: number;
  limit?: number;
  isReturned?: boolean;
}
