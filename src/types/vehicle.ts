export interface Vehicle {
  vinCode?: string;
  userId?: string;
  [field: string]: unknown;
}

export type UserProfile = Record<string, unknown>;

export type FavoriteLocation = Record<string, unknown>;
