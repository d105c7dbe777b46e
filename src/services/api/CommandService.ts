import type { ClientConfig } from "@/config/environment";
import { CommandSigner } from "@/services/crypto/CommandSigner";
import type { PairingStore } from "@/stores/PairingStore";
import type { CommandContent, HttpTransport, SignedCommand } from "@/types";
import { API_ENDPOINTS, API_TIMEOUTS, CONTROL_ALIASES, type ControlAlias } from "@/utils/constants";
import { describeBody, getErrorMessage } from "@/utils/helpers";
import { createLogger } from "@/utils/logger";

const log = createLogger("Command");

export interface SendCommandOptions {
  accessToken: string;
  /** A named control alias, or a raw `objectId_instanceId_resourceId` device key. */
  target: ControlAlias | string;
  value: unknown;
  userId: string;
  /** Defaults to the alias name when `target` is one. */
  messageName?: string;
}

const isControlAlias = (target: string): target is ControlAlias =>
  Object.hasOwn(CONTROL_ALIASES, target);

export const resolveDeviceKey = (target: ControlAlias | string): string =>
  isControlAlias(target) ? CONTROL_ALIASES[target] : target;

export class CommandService {
  constructor(
    private readonly transport: HttpTransport,
    private readonly config: ClientConfig,
    private readonly pairing: PairingStore,
    private readonly signer: CommandSigner = new CommandSigner(),
  ) {}

  /** Signs with the currently paired keys and pairing session id. */
  sign(messageName: string, messageContent: CommandContent, userId: string): SignedCommand {
    const { keys } = this.pairing.getState();
    return this.signer.sign(keys, messageName, messageContent, userId, keys.sessionId ?? "");
  }

  /** Resolves true only on HTTP 200; failures are reported, never thrown. */
  async dispatch(command: SignedCommand, accessToken: string): Promise<boolean> {
    try {
      const response = await this.transport.request({
        method: "POST",
        url: `${this.config.PAIRING_BASE_URL}${API_ENDPOINTS.REMOTE_COMMAND}`,
        headers: {
          Authorization: `Bearer ${accessToken}`,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: command,
        // Commands may wake the vehicle
        timeoutMs: API_TIMEOUTS.COMMAND,
      });

      if (response.status === 200) {
        log.info(`Command ${command.message_name} sent successfully`);
        return true;
      }

      log.error(`Command failed: ${response.status} - ${describeBody(response.data)}`);
      return false;
    } catch (error) {
      log.error("Command connection error:", getErrorMessage(error));
      return false;
    }
  }

  /** Throws PairingError when not paired; transport outcomes resolve to a boolean. */
  async sendCommand({
    accessToken,
    target,
    value,
    userId,
    messageName,
  }: SendCommandOptions): Promise<boolean> {
    const deviceKey = resolveDeviceKey(target);
    const command = this.sign(messageName ?? target, { deviceKey, value }, userId);
    return this.dispatch(command, accessToken);
  }
}
