export interface Credentials {
  email: string;
  password: string;
}

export interface AuthTokens {
  accessToken: string;
  refreshToken: string | null;
}

export interface VehicleIdentity {
  vin: string | null;
  userId: string | null;
}
