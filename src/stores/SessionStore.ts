import { createStore, type StoreApi } from "zustand/vanilla";
import type { AuthTokens, VehicleIdentity } from "@/types";

export interface SessionState extends VehicleIdentity {
  accessToken: string | null;
  refreshToken: string | null;
  isAuthenticated: boolean;
  setTokens: (tokens: AuthTokens) => void;
  applyRefresh: (accessToken: string, refreshToken: string | null) => void;
  // First vehicle wins; later calls never replace a known identity.
  setIdentity: (identity: VehicleIdentity) => void;
  clear: () => void;
}

export type SessionStore = StoreApi<SessionState>;

export const createSessionStore = (): SessionStore =>
  createStore<SessionState>((set, get) => ({
    accessToken: null,
    refreshToken: null,
    vin: null,
    userId: null,
    isAuthenticated: false,

    setTokens: (tokens: AuthTokens) => {
      set({
        accessToken: tokens.accessToken,
        refreshToken: tokens.refreshToken,
        isAuthenticated: true,
      });
    },

    applyRefresh: (accessToken: string, refreshToken: string | null) => {
      set({
        accessToken,
        refreshToken: refreshToken ?? get().refreshToken,
        isAuthenticated: true,
      });
    },

    setIdentity: (identity: VehicleIdentity) => {
      const current = get();
      set({
        vin: current.vin ?? identity.vin,
        userId: current.userId ?? identity.userId,
      });
    },

    clear: () => {
      set({
        accessToken: null,
        refreshToken: null,
        vin: null,
        userId: null,
        isAuthenticated: false,
      });
    },
  }));
