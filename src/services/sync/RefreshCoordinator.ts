import { AuthExpiredError, RetryAfterRefreshError } from "@/services/api/errors";
import type { ConnectedCarService, VehicleDataResult } from "@/services/api/ConnectedCarService";
import type { Credentials } from "@/types";
import { createLogger } from "@/utils/logger";

const log = createLogger("RefreshCoordinator");

const hasFailure = (
  result: VehicleDataResult,
  kind: typeof RetryAfterRefreshError | typeof AuthExpiredError,
): boolean => result.errors.some(({ error }) => error instanceof kind);

/**
 * Drives one refresh cycle: logs in on first use, fetches the aggregate and
 * repeats it once after a token refresh or a re-login. Overlapping calls
 * share the cycle already in flight.
 */
export class RefreshCoordinator {
  private inFlight: Promise<VehicleDataResult> | null = null;

  constructor(
    private readonly service: ConnectedCarService,
    private readonly credentials: Credentials,
  ) {}

  refresh(): Promise<VehicleDataResult> {
    if (!this.inFlight) {
      this.inFlight = this.runCycle().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async login(): Promise<void> {
    const { email, password } = this.credentials;
    await this.service.session.authenticate(email, password);
  }

  private async runCycle(): Promise<VehicleDataResult> {
    if (!this.service.session.isAuthenticated) {
      await this.login();
    }

    let result = await this.service.getAllData();

    if (hasFailure(result, AuthExpiredError)) {
      log.info("Session expired, re-authenticating");
      await this.login();
      result = await this.service.getAllData();
    } else if (hasFailure(result, RetryAfterRefreshError)) {
      log.debug("Token refreshed during fetch, retrying");
      result = await this.service.getAllData();
    }

    return result;
  }
}
