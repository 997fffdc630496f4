import type { IAuthProvider } from "./interfaces/auth-provider.interface";
import { ConfigurationError } from "../lib/errors";

export class StaticAuthProvider implements IAuthProvider {
  constructor(
    private readonly accountNumber: string,
    private readonly accountSecret: string,
  ) {
    if (!accountNumber || !accountSecret) {
      throw new ConfigurationError("Account number and secret are required");
    }
  }

  getAccountNumber(): string {
    return this.accountNumber;
  }

  getAccountSecret(): string {
    return this.accountSecret;
  }
}
