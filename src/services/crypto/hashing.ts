import CryptoJS from "crypto-js";

const toWordArray = (bytes: Uint8Array): CryptoJS.lib.WordArray =>
  CryptoJS.enc.Hex.parse(Buffer.from(bytes).toString("hex"));

export const hmacSha256 = (key: Uint8Array, message: string): CryptoJS.lib.WordArray =>
  CryptoJS.HmacSHA256(CryptoJS.enc.Utf8.parse(message), toWordArray(key));

export const hmacSha256Base64 = (key: Uint8Array, message: string): string =>
  hmacSha256(key, message).toString(CryptoJS.enc.Base64);

export const sha256Base64 = (message: string): string =>
  CryptoJS.SHA256(CryptoJS.enc.Utf8.parse(message)).toString(CryptoJS.enc.Base64);
