export interface PollConfig {
  ocppEntity: string | null;
  chargingState: string;
  normalIntervalSeconds: number;
  chargingIntervalSeconds: number;
}

export interface PollState {
  intervalSeconds: number;
  isCharging: boolean;
}

export interface PollTransition extends PollState {
  changed: boolean;
  refreshNow: boolean;
}

export interface PollScheduler {
  getInterval(): number;
  setInterval(seconds: number): void;
  requestRefresh(): Promise<void>;
}

export interface StateChange {
  oldState: string | null;
  newState: string | null;
}

export type Unsubscribe = () => void;

export interface StateSource {
  getState(entityId: string): string | null;
  subscribe(entityId: string, listener: (change: StateChange) => void): Unsubscribe;
}
