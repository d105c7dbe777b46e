import type { pki } from "node-forge";

export type QrParams = Record<string, string> & {
  K: string;
  ssid: string;
  vin: string;
  timeout: string;
};

export interface ContactInfo {
  phoneNumber?: string | null;
  email?: string | null;
}

export interface GeneratedKeyPair {
  privateKey: pki.rsa.PrivateKey;
  publicKey: pki.rsa.PublicKey;
  privateKeyPem: string;
}

export interface EncryptedCsr {
  encryptedCsr: string;
  seed: string;
  // HMAC-derived key; computed but not applied to the transmitted CSR
  derivedKey: string;
}

/** Ephemeral state of one pairing attempt, from QR scan to OTP submission. */
export interface PairingSession {
  params: QrParams;
  qrKey: string;
  sessionId: string;
  vin: string;
  userId: string | null;
  keyPair?: GeneratedKeyPair;
  csr?: string;
  encryptedCsr?: string;
  seed?: string;
}

export type PairingPhase =
  | { status: "idle" }
  | { status: "qrParsed"; session: PairingSession }
  | { status: "validated"; session: PairingSession }
  | { status: "keysGenerated"; session: PairingSession & { keyPair: GeneratedKeyPair } }
  | {
      status: "csrReady";
      session: PairingSession & { keyPair: GeneratedKeyPair; csr: string };
    }
  | {
      status: "encryptedReady";
      session: PairingSession & {
        keyPair: GeneratedKeyPair;
        csr: string;
        encryptedCsr: string;
        seed: string;
      };
    }
  | {
      status: "otpTriggered";
      session: PairingSession & {
        keyPair: GeneratedKeyPair;
        csr: string;
        encryptedCsr: string;
        seed: string;
      };
    }
  | { status: "paired" }
  | { status: "failed"; reason: string };

export type PairingStatus = PairingPhase["status"];

export type PairDataResponse = Record<string, unknown>;

export interface StartPairingRequest {
  qrContent: string;
  vin: string;
  userId?: string | null;
  accessToken: string;
  deviceId: string;
  deviceName?: string;
  contact?: ContactInfo;
}
