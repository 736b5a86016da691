import type { LedgerStateStore } from "./db";
import type { AccountId, Bps, PlatformConfig } from "./types";

const ADMIN_KEY = "platform_admin";
const FEE_BPS_KEY = "platform_fee_bps";

/**
 * Admin identity and platform fee rate. Stored with the ledger so every instance
 * bound to a database sees the same values.
 */
export class PlatformSettings {
  constructor(
    private readonly state: LedgerStateStore,
    deployer: AccountId,
  ) {
    if (this.state.get(ADMIN_KEY) === null) {
      this.state.set(ADMIN_KEY, deployer);
    }
    if (this.state.get(FEE_BPS_KEY) === null) {
      this.state.set(FEE_BPS_KEY, "0");
    }
  }

  getAdmin(): AccountId {
    const admin = this.state.get(ADMIN_KEY);
    if (admin === null) {
      throw new Error("Platform admin is not initialized");
    }
    return admin;
  }

  setAdmin(admin: AccountId): void {
    this.state.set(ADMIN_KEY, admin);
  }

  getPlatformFeeBps(): Bps {
    return Number(this.state.get(FEE_BPS_KEY) ?? "0");
  }

  setPlatformFeeBps(feeBps: Bps): void {
    this.state.set(FEE_BPS_KEY, feeBps.toString());
  }

  isAdmin(account: AccountId): boolean {
    return this.getAdmin() === account;
  }

  snapshot(): PlatformConfig {
    return {
      admin: this.getAdmin(),
      platformFeeBps: this.getPlatformFeeBps(),
    };
  }
}
