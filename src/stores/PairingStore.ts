import { createStore, type StoreApi } from "zustand/vanilla";
import { PairingError } from "@/services/api/errors";
import type { PairingService } from "@/services/api/PairingService";
import { PairingKeyManager } from "@/services/crypto/PairingKeyManager";
import type {
  ContactInfo,
  PairDataResponse,
  PairingKeyMaterial,
  PairingKeyRecord,
  PairingPhase,
  PairingSession,
  PairingStatus,
  QrParams,
  StartPairingRequest,
} from "@/types";
import { decodeBase64, getErrorMessage } from "@/utils/helpers";
import { createLogger } from "@/utils/logger";
import { parseQrCode, validateQrForVehicle } from "@/utils/validation";

const log = createLogger("PairingStore");

type PhaseOf<S extends PairingStatus> = Extract<PairingPhase, { status: S }>;

const EMPTY_KEYS: PairingKeyMaterial = {
  privateKey: null,
  privateKeyPem: null,
  sharedKey: null,
  sharedKeyB64: null,
  sessionId: null,
};

const IN_PROGRESS: readonly PairingStatus[] = [
  "qrParsed",
  "validated",
  "keysGenerated",
  "csrReady",
  "encryptedReady",
  "otpTriggered",
];

const isPhase = <S extends PairingStatus>(
  phase: PairingPhase,
  statuses: readonly S[],
): phase is PhaseOf<S> => statuses.some((status) => status === phase.status);

export interface PairingStoreState {
  phase: PairingPhase;
  keys: PairingKeyMaterial;

  scanQr: (content: string) => QrParams;
  validateQr: (expectedVin: string, expectedUserId?: string | null) => void;
  generateKeyPair: () => void;
  generateCsr: (deviceId: string, deviceName?: string) => string;
  encryptCsr: (seedHex?: string) => void;
  verifySession: (accessToken: string, contact?: ContactInfo, retry?: boolean) => Promise<void>;
  sendPairData: (
    accessToken: string,
    otp: string,
    contact?: ContactInfo,
  ) => Promise<PairDataResponse>;
  startPairing: (request: StartPairingRequest) => Promise<QrParams>;
  submitOtp: (accessToken: string, otp: string, contact?: ContactInfo) => Promise<PairDataResponse>;
  exportKeys: () => PairingKeyRecord | Record<string, never>;
  importKeys: (record: Partial<PairingKeyRecord>) => boolean;
  reset: () => void;
  unpair: () => void;
}

export type PairingStore = StoreApi<PairingStoreState>;

export const isPaired = (state: Pick<PairingStoreState, "keys">): boolean =>
  state.keys.privateKey !== null;

export const canSignCommands = (state: Pick<PairingStoreState, "keys">): boolean =>
  state.keys.privateKey !== null && state.keys.sharedKey !== null;

/**
 * Enrollment state machine:
 * idle → qrParsed → validated → keysGenerated → csrReady → encryptedReady →
 * otpTriggered → paired, or failed from any step. A failed step discards the
 * pairing session; the user restarts from the QR scan. Key material from an
 * earlier pairing survives a failed attempt.
 */
export const createPairingStore = (pairingService: PairingService): PairingStore =>
  createStore<PairingStoreState>((set, get) => {
    const expectPhase = <S extends PairingStatus>(
      action: string,
      ...statuses: S[]
    ): PhaseOf<S> => {
      const { phase } = get();
      if (!isPhase(phase, statuses)) {
        throw new PairingError(`Cannot ${action} while pairing is ${phase.status}`);
      }
      return phase;
    };

    // False once a reset or a new scan replaced the attempt during a request.
    const isCurrent = (session: PairingSession): boolean => {
      const { phase } = get();
      return "session" in phase && phase.session === session;
    };

    const ensureCurrent = (session: PairingSession): void => {
      if (!isCurrent(session)) {
        throw new PairingError("Pairing attempt was abandoned");
      }
    };

    // A stale attempt reports its error without touching the phase.
    const fail = (error: unknown, session?: PairingSession): never => {
      const reason = getErrorMessage(error);
      log.error("Pairing failed:", reason);
      if (!session || isCurrent(session)) {
        set({ phase: { status: "failed", reason } });
      }
      throw error instanceof PairingError ? error : new PairingError(reason, { cause: error });
    };

    return {
      phase: { status: "idle" },
      keys: EMPTY_KEYS,

      scanQr: (content: string) => {
        const { phase } = get();
        if (isPhase(phase, IN_PROGRESS)) {
          throw new PairingError("A pairing attempt is already in progress");
        }

        try {
          const params = parseQrCode(content);
          const session: PairingSession = {
            params,
            qrKey: params.K,
            sessionId: params.ssid,
            vin: params.vin,
            userId: null,
          };
          set({ phase: { status: "qrParsed", session } });
          return params;
        } catch (error) {
          return fail(error);
        }
      },

      validateQr: (expectedVin: string, expectedUserId?: string | null) => {
        const { session } = expectPhase("validate the QR code", "qrParsed");
        try {
          validateQrForVehicle(session.params, expectedVin, expectedUserId);
          set({
            phase: {
              status: "validated",
              session: { ...session, vin: expectedVin, userId: expectedUserId ?? null },
            },
          });
        } catch (error) {
          fail(error);
        }
      },

      generateKeyPair: () => {
        const { session } = expectPhase("generate keys", "validated");
        try {
          const keyPair = PairingKeyManager.generateKeyPair();
          set({ phase: { status: "keysGenerated", session: { ...session, keyPair } } });
        } catch (error) {
          fail(error);
        }
      },

      generateCsr: (deviceId: string, deviceName?: string) => {
        const { session } = expectPhase("generate a CSR", "keysGenerated");
        try {
          const csr = PairingKeyManager.generateCsr(
            session.keyPair,
            session.vin,
            deviceId,
            deviceName,
          );
          set({ phase: { status: "csrReady", session: { ...session, csr } } });
          return csr;
        } catch (error) {
          return fail(error);
        }
      },

      encryptCsr: (seedHex?: string) => {
        const { session } = expectPhase("encrypt the CSR", "csrReady");
        try {
          const { encryptedCsr, seed } = PairingKeyManager.encryptCsr(
            session.csr,
            session.qrKey,
            session.vin,
            seedHex,
          );
          set({
            phase: { status: "encryptedReady", session: { ...session, encryptedCsr, seed } },
          });
        } catch (error) {
          fail(error);
        }
      },

      verifySession: async (accessToken: string, contact: ContactInfo = {}, retry = false) => {
        const { session } = retry
          ? expectPhase("resend the OTP", "encryptedReady", "otpTriggered")
          : expectPhase("request an OTP", "encryptedReady");

        try {
          await pairingService.verifySession(accessToken, session.sessionId, contact, retry);
          ensureCurrent(session);
          set({ phase: { status: "otpTriggered", session } });
        } catch (error) {
          fail(error, session);
        }
      },

      sendPairData: async (accessToken: string, otp: string, contact: ContactInfo = {}) => {
        const { session } = expectPhase("submit the OTP", "otpTriggered");

        try {
          const response = await pairingService.sendPairData(
            accessToken,
            session.encryptedCsr,
            otp,
            session.seed,
            session.sessionId,
            contact,
          );
          ensureCurrent(session);

          let sharedKey: Buffer | null = null;
          let sharedKeyB64: string | null = null;
          const shareKey = response.base64EncryptedShareKey;
          if (typeof shareKey === "string" && shareKey) {
            try {
              sharedKey = decodeBase64(shareKey);
              sharedKeyB64 = shareKey;
            } catch (decodeError) {
              log.warn("Failed to decode shared key:", getErrorMessage(decodeError));
            }
          } else {
            log.warn("Pairing response carried no share key; commands cannot be signed");
          }

          set({
            phase: { status: "paired" },
            keys: {
              privateKey: session.keyPair.privateKey,
              privateKeyPem: session.keyPair.privateKeyPem,
              sharedKey,
              sharedKeyB64,
              sessionId: session.sessionId,
            },
          });
          log.info("Pairing successful");
          return response;
        } catch (error) {
          return fail(error, session);
        }
      },

      startPairing: async (request: StartPairingRequest) => {
        const { scanQr, validateQr, generateKeyPair, generateCsr, encryptCsr, verifySession } =
          get();
        const params = scanQr(request.qrContent);
        validateQr(request.vin, request.userId);
        generateKeyPair();
        generateCsr(request.deviceId, request.deviceName);
        encryptCsr();
        await verifySession(request.accessToken, request.contact);
        return params;
      },

      submitOtp: (accessToken: string, otp: string, contact?: ContactInfo) =>
        get().sendPairData(accessToken, otp, contact),

      exportKeys: (): PairingKeyRecord | Record<string, never> => {
        const { keys } = get();
        if (!keys.privateKeyPem) {
          return {};
        }
        return {
          private_key_pem: keys.privateKeyPem,
          shared_key_b64: keys.sharedKeyB64 ?? "",
          session_id: keys.sessionId ?? "",
        };
      },

      importKeys: (record: Partial<PairingKeyRecord>) => {
        const privateKeyPem = record.private_key_pem ?? "";
        const sharedKeyB64 = record.shared_key_b64 ?? "";
        if (!privateKeyPem || !sharedKeyB64) {
          return false;
        }

        try {
          const { privateKey } = PairingKeyManager.importPrivateKey(privateKeyPem);
          const sharedKey = decodeBase64(sharedKeyB64);
          set({
            phase: { status: "paired" },
            keys: {
              privateKey,
              privateKeyPem,
              sharedKey,
              sharedKeyB64,
              sessionId: record.session_id ?? "",
            },
          });
          log.info("Pairing keys imported");
          return true;
        } catch (error) {
          log.error("Failed to import keys:", getErrorMessage(error));
          return false;
        }
      },

      reset: () => {
        set({ phase: isPaired(get()) ? { status: "paired" } : { status: "idle" } });
      },

      unpair: () => {
        set({ phase: { status: "idle" }, keys: EMPTY_KEYS });
      },
    };
  });
