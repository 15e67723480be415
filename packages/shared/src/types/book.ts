export interface Book {
  id: number;
  title: string;
  isbn: string;
  publishedYear: number | null;
  authorId: number | null;
  description: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface BookSummary {
  id: number;
  title: string;
  isbn: string;
  publishedYear: number | null;
}

export interface CreateBookRequest {
  title: string;
  isbn: string;
  publishedYear?: number | null;
  authorId?: number | null;
  description?: string | null;
  // Number of physical copies to register; each becomes its own row.
  copies?: number;
}

export type UpdateBookRequest = Partial<Omit<CreateBookRequest, 'copies'>>;

export interface BookListParams {
  skip?: number;
  limit?: number;
  search?: string;
  authorId?: number;
  availableOnly?: boolean;
}

export interface IsbnAvailability {
  isbn: string;
  totalCopies: number;
  borrowedCopies: number;
  availableCopies: number;
  isAvailable: boolean;
}

export interface BookAvailability extends IsbnAvailability {
  bookId: number;
  title: string;
}
