import type {
  PollConfig,
  PollScheduler,
  PollTransition,
  StateChange,
  StateSource,
  Unsubscribe,
} from "@/types";
import { POLL_DEFAULTS, POLL_INTERVALS } from "@/utils/constants";
import { getErrorMessage } from "@/utils/helpers";
import { createLogger } from "@/utils/logger";

const log = createLogger("PollController");

export const defaultPollConfig = (overrides: Partial<PollConfig> = {}): PollConfig => ({
  ocppEntity: POLL_DEFAULTS.OCPP_ENTITY,
  chargingState: POLL_DEFAULTS.OCPP_CHARGING_STATE,
  normalIntervalSeconds: POLL_INTERVALS.NORMAL,
  chargingIntervalSeconds: POLL_INTERVALS.CHARGING,
  ...overrides,
});

export const computePollTransition = (
  wasCharging: boolean,
  newState: string | null,
  config: PollConfig,
): PollTransition => {
  const isCharging = newState !== null && newState === config.chargingState;
  return {
    isCharging,
    intervalSeconds: isCharging ? config.chargingIntervalSeconds : config.normalIntervalSeconds,
    changed: wasCharging !== isCharging,
    refreshNow: !wasCharging && isCharging,
  };
};

/**
 * Shortens the refresh cadence while an external charger entity reports
 * charging, and asks for an immediate refresh when charging starts.
 */
export class PollController {
  private charging = false;
  private unsubscribeListener: Unsubscribe | null = null;

  constructor(
    private readonly source: StateSource,
    private readonly scheduler: PollScheduler,
    private readonly config: PollConfig = defaultPollConfig(),
  ) {}

  get isCharging(): boolean {
    return this.charging;
  }

  setup(): void {
    const entity = this.config.ocppEntity;
    if (!entity) {
      log.debug("No charger entity configured, skipping listener");
      return;
    }
    if (this.unsubscribeListener) {
      return;
    }

    const initial = this.source.getState(entity);
    if (initial !== null) {
      const transition = computePollTransition(this.charging, initial, this.config);
      this.charging = transition.isCharging;
      this.applyInterval(transition.intervalSeconds);
      log.debug(`Initial charger state: ${initial} (charging=${this.charging})`);
    }

    this.unsubscribeListener = this.source.subscribe(entity, (change) =>
      this.handleStateChange(change),
    );
    log.debug(`Listening for charger state changes on ${entity}`);
  }

  handleStateChange({ oldState, newState }: StateChange): void {
    if (newState === null) {
      return;
    }

    const transition = computePollTransition(this.charging, newState, this.config);
    this.charging = transition.isCharging;
    if (!transition.changed) {
      return;
    }

    log.debug(
      `Charger state changed: ${oldState ?? "unknown"} -> ${newState} (charging=${this.charging})`,
    );
    this.applyInterval(transition.intervalSeconds);

    if (transition.refreshNow) {
      this.scheduler.requestRefresh().catch((error: unknown) => {
        log.error("Immediate refresh failed:", getErrorMessage(error));
      });
    }
  }

  unsubscribe(): void {
    if (this.unsubscribeListener) {
      this.unsubscribeListener();
      this.unsubscribeListener = null;
    }
  }

  private applyInterval(seconds: number): void {
    if (this.scheduler.getInterval() !== seconds) {
      this.scheduler.setInterval(seconds);
      log.debug(`Polling interval set to ${seconds}s`);
    }
  }
}
