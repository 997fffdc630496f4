import type { Adapter } from "../adapters/adapter";
import type { AccountInfo } from "../types/ads";

export interface RequestLocale {
  country: string;
  language: string;
}

/** Base for ChromeData service requests: owns the adapter and the account block every call carries. */
export abstract class Request {
  protected constructor(
    protected readonly adapter: Adapter,
    protected readonly locale: RequestLocale,
  ) {}

  protected accountInfo(): AccountInfo {
    const auth = this.adapter.getAuth();
    return {
      number: auth.getAccountNumber(),
      secret: auth.getAccountSecret(),
      country: this.locale.country,
      language: this.locale.language,
    };
  }
}
