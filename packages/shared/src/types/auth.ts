import type { USER_ROLES } from '../constants/index.js';

export type UserRole = (typeof USER_ROLES)[number];

export interface User {
  id: number;
  username: string;
  email: string;
  fullName: string | null;
  role: UserRole;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface UserProfile {
  id: number;
  username: string;
  email: string;
  fullName: string | null;
  role: UserRole;
  isActive: boolean;
}

export interface LoginRequest {
  username: string;
  password: string;
}

export interface RegisterRequest {
  username: string;
  email: string;
  password: string;
  fullName?: string;
}

export interface UpdateUserRequest {
  email?: string;
  fullName?: string | null;
  isActive?: boolean;
  role?: UserRole;
}

export interface ChangePasswordRequest {
  currentPassword?: string;
  newPassword: string;
}

export interface UserListParams {
  skip?: number;
  limit?: number;
  role?: UserRole;
  isActive?: boolean;
}
