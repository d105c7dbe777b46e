import type { pki } from "node-forge";

/** Durable output of a successful pairing; the engine holds a working copy. */
export interface PairingKeyMaterial {
  privateKey: pki.rsa.PrivateKey | null;
  privateKeyPem: string | null;
  sharedKey: Uint8Array | null;
  sharedKeyB64: string | null;
  sessionId: string | null;
}

/** Persisted form of the key material, as stored by the host. */
export interface PairingKeyRecord {
  private_key_pem: string;
  shared_key_b64: string;
  session_id: string;
}

export type CommandContent = Record<string, unknown>;

export interface SignedCommand {
  message_name: string;
  message_content: string;
  sess_id: string;
  timestamp: string;
  signature: string;
  tag: null;
  user_id: string;
  isMasterProfile: boolean;
  signature2: string;
  wakeUpTimeOut: number;
}
