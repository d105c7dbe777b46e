import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { PairingKeyRecord } from "@/types";
import { STORAGE_KEYS } from "@/utils/constants";
import { getErrorMessage, isRecord } from "@/utils/helpers";
import { createLogger } from "@/utils/logger";

const log = createLogger("Storage");

/** Async string slot store, shaped like the host key-value stores it wraps. */
export interface KeyValueStorage {
  getItem(key: string): Promise<string | null>;
  setItem(key: string, value: string): Promise<void>;
  removeItem(key: string): Promise<void>;
}

export class MemoryStorage implements KeyValueStorage {
  private readonly items = new Map<string, string>();

  async getItem(key: string): Promise<string | null> {
    return this.items.get(key) ?? null;
  }

  async setItem(key: string, value: string): Promise<void> {
    this.items.set(key, value);
  }

  async removeItem(key: string): Promise<void> {
    this.items.delete(key);
  }
}

/** Keeps every slot in one JSON object on disk. */
export class FileStorage implements KeyValueStorage {
  constructor(private readonly path: string) {}

  private async readAll(): Promise<Record<string, string>> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (error) {
      if (isRecord(error) && error.code === "ENOENT") {
        return {};
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(text);
    const items: Record<string, string> = {};
    if (isRecord(parsed)) {
      for (const [key, value] of Object.entries(parsed)) {
        if (typeof value === "string") {
          items[key] = value;
        }
      }
    }
    return items;
  }

  private async writeAll(items: Record<string, string>): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, JSON.stringify(items, null, 2), { encoding: "utf8", mode: 0o600 });
  }

  async getItem(key: string): Promise<string | null> {
    const items = await this.readAll();
    return items[key] ?? null;
  }

  async setItem(key: string, value: string): Promise<void> {
    const items = await this.readAll();
    items[key] = value;
    await this.writeAll(items);
  }

  async removeItem(key: string): Promise<void> {
    const items = await this.readAll();
    delete items[key];
    await this.writeAll(items);
  }
}

const toKeyRecord = (value: unknown): Partial<PairingKeyRecord> => {
  if (!isRecord(value)) {
    return {};
  }
  const record: Partial<PairingKeyRecord> = {};
  if (typeof value.private_key_pem === "string") {
    record.private_key_pem = value.private_key_pem;
  }
  if (typeof value.shared_key_b64 === "string") {
    record.shared_key_b64 = value.shared_key_b64;
  }
  if (typeof value.session_id === "string") {
    record.session_id = value.session_id;
  }
  return record;
};

export class StorageService {
  constructor(private readonly storage: KeyValueStorage = new MemoryStorage()) {}

  async savePairingKeys(record: PairingKeyRecord): Promise<void> {
    if (!record.private_key_pem) {
      throw new Error("Private key is required");
    }
    try {
      await this.storage.setItem(STORAGE_KEYS.PAIRING_KEYS, JSON.stringify(record));
    } catch (error) {
      log.error("Failed to save pairing keys:", getErrorMessage(error));
      throw new Error("Failed to save pairing keys", { cause: error });
    }
  }

  /** Null when nothing is stored or the slot cannot be read. */
  async loadPairingKeys(): Promise<Partial<PairingKeyRecord> | null> {
    try {
      const raw = await this.storage.getItem(STORAGE_KEYS.PAIRING_KEYS);
      return raw ? toKeyRecord(JSON.parse(raw)) : null;
    } catch (error) {
      log.error("Failed to load pairing keys:", getErrorMessage(error));
      return null;
    }
  }

  async clearPairingKeys(): Promise<void> {
    try {
      await this.storage.removeItem(STORAGE_KEYS.PAIRING_KEYS);
    } catch (error) {
      log.error("Failed to clear pairing keys:", getErrorMessage(error));
      throw new Error("Failed to clear pairing keys", { cause: error });
    }
  }
}
