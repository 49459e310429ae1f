import { Logger } from "../types/common";
import { UnauthorizedError } from "../errors";
import { validateAddress } from "../utils/validation";

/**
 * Access module -- who may trigger rebalances.
 *
 * Authorized rebalancers form a self-extending set bootstrapped with the
 * owner: any member may add or remove any other, the owner included.
 * The automation role is separate and holds the capability to rebalance
 * through the cooldown; only the owner manages it.
 */
export class AccessModule {
  readonly owner: string;
  private rebalancers = new Set<string>();
  private automation = new Set<string>();
  private logger?: Logger;

  constructor(owner: string, automationAccounts: string[] = [], logger?: Logger) {
    validateAddress(owner, "owner");
    for (const account of automationAccounts) validateAddress(account, "automationAccount");

    this.owner = owner;
    this.rebalancers.add(owner);
    for (const account of automationAccounts) this.automation.add(account);
    this.logger = logger;
  }

  isAuthorizedRebalancer(account: string): boolean {
    return this.rebalancers.has(account);
  }

  hasAutomationRole(account: string): boolean {
    return this.automation.has(account);
  }

  addAuthorizedRebalancer(caller: string, account: string): void {
    this.requireRebalancer(caller, "add rebalancers");
    validateAddress(account, "account");
    this.rebalancers.add(account);
    this.logger?.info("addAuthorizedRebalancer", { caller, account });
  }

  removeAuthorizedRebalancer(caller: string, account: string): void {
    this.requireRebalancer(caller, "remove rebalancers");
    this.rebalancers.delete(account);
    this.logger?.info("removeAuthorizedRebalancer", { caller, account });
  }

  grantAutomation(caller: string, account: string): void {
    this.requireOwner(caller, "grant the automation role");
    validateAddress(account, "account");
    this.automation.add(account);
    this.logger?.info("grantAutomation", { account });
  }

  revokeAutomation(caller: string, account: string): void {
    this.requireOwner(caller, "revoke the automation role");
    this.automation.delete(account);
    this.logger?.info("revokeAutomation", { account });
  }

  requireRebalancer(caller: string, action: string): void {
    if (!this.rebalancers.has(caller)) throw new UnauthorizedError(caller, action);
  }

  requireAutomation(caller: string, action: string): void {
    if (!this.automation.has(caller)) throw new UnauthorizedError(caller, action);
  }

  private requireOwner(caller: string, action: string): void {
    if (caller !== this.owner) throw new UnauthorizedError(caller, action);
  }
}
