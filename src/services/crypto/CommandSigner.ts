import forge, { type pki } from "node-forge";
import type { CommandContent, SignedCommand } from "@/types";
import { PairingError } from "@/services/api/errors";
import { COMMAND_CONFIG } from "@/utils/constants";
import { encodeBase64 } from "@/utils/helpers";
import { hmacSha256Base64, sha256Base64 } from "./hashing";

export interface SigningKeys {
  privateKey: pki.rsa.PrivateKey | null;
  sharedKey: Uint8Array | null;
}

/** Compact JSON with every code unit above 0x7F written as a `\uXXXX` escape. */
export const toAsciiJson = (value: unknown): string =>
  JSON.stringify(value).replace(
    /[\u0080-\uffff]/g,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`,
  );

export const hashUserId = (userId: string): string => sha256Base64(userId);

export const rsaSignBase64 = (privateKey: pki.rsa.PrivateKey, message: string): string => {
  const digest = forge.md.sha256.create();
  digest.update(message, "utf8");
  return forge.util.encode64(privateKey.sign(digest));
};

/**
 * Produces dual-signed remote commands. Both signatures cover
 * `timestamp ++ base64(content)`: RSA-PKCS#1 v1.5/SHA-256 with the paired
 * private key and HMAC-SHA256 with the server-issued share key.
 */
export class CommandSigner {
  private lastTimestamp = 0;

  constructor(private readonly clock: () => number = Date.now) {}

  // Strictly increasing so two commands never share a timestamp.
  private nextTimestamp(): string {
    const now = Math.max(Math.floor(this.clock()), this.lastTimestamp + 1);
    this.lastTimestamp = now;
    return String(now);
  }

  sign(
    keys: SigningKeys,
    messageName: string,
    messageContent: CommandContent,
    userId: string,
    sessionId: string,
  ): SignedCommand {
    const { privateKey, sharedKey } = keys;
    if (!privateKey || !sharedKey) {
      throw new PairingError("Not paired - cannot sign commands");
    }

    const timestamp = this.nextTimestamp();
    const contentB64 = encodeBase64(toAsciiJson(messageContent));
    const signedData = `${timestamp}${contentB64}`;

    return {
      message_name: messageName,
      message_content: contentB64,
      sess_id: sessionId,
      timestamp,
      signature: rsaSignBase64(privateKey, signedData),
      tag: null,
      user_id: hashUserId(userId),
      isMasterProfile: COMMAND_CONFIG.IS_MASTER_PROFILE,
      signature2: hmacSha256Base64(sharedKey, signedData),
      wakeUpTimeOut: COMMAND_CONFIG.WAKE_UP_TIMEOUT,
    };
  }
}
