export interface ApiResponse<T> {
  data: T;
  meta: ResponseMeta | null;
  errors: ApiError[] | null;
}

export interface ResponseMeta {
  total: number;
  skip: number;
  limit: number;
}

export interface ApiError {
  code: string;
  field: string | null;
  message: string;
}

export interface PageParams {
  skip?: number;
  limit?: number;
}

export interface Page<T> {
  items: T[];
  total: number;
  skip: number;
  limit: number;
}
