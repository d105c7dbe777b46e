import forge, { type pki } from "node-forge";
import CryptoJS from "crypto-js";
import { bytesToHex, randomBytes } from "@noble/hashes/utils";
import type { EncryptedCsr, GeneratedKeyPair } from "@/types";
import { PairingError } from "@/services/api/errors";
import { PAIRING_CONFIG } from "@/utils/constants";
import { decodeBase64, encodeBase64, getErrorMessage } from "@/utils/helpers";
import { hmacSha256 } from "./hashing";

export class PairingKeyManager {
  static generateKeyPair(): GeneratedKeyPair {
    const { privateKey, publicKey } = forge.pki.rsa.generateKeyPair({
      bits: PAIRING_CONFIG.RSA_BITS,
      e: PAIRING_CONFIG.RSA_EXPONENT,
    });

    return {
      privateKey,
      publicKey,
      privateKeyPem: this.exportPrivateKey(privateKey),
    };
  }

  /** Unencrypted PKCS#8 PEM. */
  static exportPrivateKey(privateKey: pki.rsa.PrivateKey): string {
    const info = forge.pki.wrapRsaPrivateKey(forge.pki.privateKeyToAsn1(privateKey));
    return forge.pki.privateKeyInfoToPem(info);
  }

  /** Accepts PKCS#8 and PKCS#1 PEM; throws on anything else. */
  static importPrivateKey(pem: string): GeneratedKeyPair {
    const privateKey = forge.pki.privateKeyFromPem(pem);
    const publicKey = forge.pki.rsa.setPublicKey(privateKey.n, privateKey.e);
    return { privateKey, publicKey, privateKeyPem: pem };
  }

  static escapeDnValue(value: string): string {
    let escaped = value;
    for (const char of PAIRING_CONFIG.DN_SPECIAL_CHARS) {
      escaped = escaped.split(char).join(`\\${char}`);
    }
    return escaped;
  }

  /** CSR with subject `CN={vin}_{deviceId}, OU={deviceName}`, signed with SHA-256. */
  static generateCsr(
    keyPair: GeneratedKeyPair,
    vin: string,
    deviceId: string,
    deviceName: string = PAIRING_CONFIG.DEFAULT_DEVICE_NAME,
  ): string {
    const csr = forge.pki.createCertificationRequest();
    csr.publicKey = keyPair.publicKey;
    csr.setSubject([
      { name: "commonName", value: `${vin}_${deviceId}` },
      { name: "organizationalUnitName", value: this.escapeDnValue(deviceName) },
    ]);
    csr.sign(keyPair.privateKey, forge.md.sha256.create());
    return forge.pki.certificationRequestToPem(csr);
  }

  static generateSeed(): string {
    return bytesToHex(randomBytes(PAIRING_CONFIG.SEED_BYTES));
  }

  /**
   * Prepares the CSR for the send-pair-data call.
   *
   * The HMAC-derived key is computed but not applied: the CSR goes out as
   * base64 plaintext, which is what the server has been observed to accept.
   * Whether the backend expects an encrypted CSR is unconfirmed.
   */
  static encryptCsr(
    csrPem: string,
    qrKeyB64: string,
    vin: string,
    seedHex: string = this.generateSeed(),
  ): EncryptedCsr {
    let qrKey: Buffer;
    try {
      qrKey = decodeBase64(qrKeyB64);
    } catch (error) {
      throw new PairingError(`QR key is not valid base64: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    const derivedKey = hmacSha256(qrKey, `${vin}${seedHex}`).toString(CryptoJS.enc.Base64);

    return {
      encryptedCsr: encodeBase64(csrPem),
      seed: encodeBase64(seedHex),
      derivedKey,
    };
  }
}
