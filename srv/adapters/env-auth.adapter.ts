import type { IAuthProvider } from "./interfaces/auth-provider.interface";
import { ConfigurationError } from "../lib/errors";

/** Reads credentials from CHROMEDATA_ACCOUNT_NUMBER / CHROMEDATA_ACCOUNT_SECRET on each access. */
export class EnvAuthProvider implements IAuthProvider {
  getAccountNumber(): string {
    return requireEnv("CHROMEDATA_ACCOUNT_NUMBER");
  }

  getAccountSecret(): string {
    return requireEnv("CHROMEDATA_ACCOUNT_SECRET");
  }
}

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new ConfigurationError(`Missing required ChromeData credential: ${name} must be set`);
  }
  return value;
}
