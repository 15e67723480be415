import type { BookSummary } from './book.js';

export interface Author {
  id: number;
  name: string;
  email: string | null;
  bio: string | null;
  birthDate: string | null;
  nationality: string | null;
  website: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface AuthorDetail extends Author {
  books: BookSummary[];
}

export interface CreateAuthorRequest {
  name: string;
  email?: string | null;
  bio?: string | null;
  birthDate?: string | null;
  nationality?: string | null;
  website?: string | null;
}

export type UpdateAuthorRequest = Partial<CreateAuthorRequest>;

export interface AuthorListParams {
  skip?: number;
  limit?: number;
  search?: string;
  nationality?: string;
}
